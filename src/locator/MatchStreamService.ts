import { assertExists } from "../utils/assert";

import type { MatchSpan, NormalizedPattern } from "./_interfaces";

const toSpan = (
  text: string,
  lastEnd: number,
  index: number,
  matched: string
): MatchSpan => Object.freeze({
  preceding: text.slice(lastEnd, index),
  matched,
  lookahead: text.charAt(index + matched.length)
});

/** Scans for a literal with plain substring search. */
const literalSpans = function*(text: string, literal: string): Iterable<MatchSpan> {
  let lastEnd = 0;
  let index = text.indexOf(literal);
  while (index !== -1) {
    yield toSpan(text, lastEnd, index, literal);
    lastEnd = index + literal.length;
    index = text.indexOf(literal, lastEnd);
  }
};

const isHighSurrogate = (code: number) => code >= 0xd800 && code <= 0xdbff;
const isLowSurrogate = (code: number) => code >= 0xdc00 && code <= 0xdfff;

/** Whether `index` falls between the two halves of a surrogate pair. */
const splitsPair = (text: string, index: number): boolean =>
  index > 0
  && isLowSurrogate(text.charCodeAt(index))
  && isHighSurrogate(text.charCodeAt(index - 1));

/**
 * Scans with a global regular expression.  `String#matchAll` only runs
 * the expression when the next match is asked for, and it steps past any
 * empty match on its own.  Empty matches inside a surrogate pair are
 * dropped, so every location falls on a codepoint.
 */
const regexSpans = function*(text: string, regex: RegExp): Iterable<MatchSpan> {
  let lastEnd = 0;
  for (const match of text.matchAll(regex)) {
    const index = assertExists("Expected an index.", match.index);
    const [matched] = match;
    // Without the `u` flag, an empty match can land inside a character.
    if (matched.length === 0 && splitsPair(text, index)) continue;
    yield toSpan(text, lastEnd, index, matched);
    lastEnd = index + matched.length;
  }
};

/**
 * Lazily produces a {@link MatchSpan} for each occurrence of `pattern`
 * in `text`, in document order, from one forward scan of the whole text.
 * Matches may span line terminators.
 */
export const matchSpans = (text: string, pattern: NormalizedPattern): Iterable<MatchSpan> => {
  switch (pattern.type) {
    case "literal": return literalSpans(text, pattern.text);
    case "regex": return regexSpans(text, pattern.regex);
  }
};
