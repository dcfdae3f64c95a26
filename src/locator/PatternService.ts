/**
 * Turns what a caller asks to search for into something the match
 * stream can work with.
 *
 * Supports:
 * - A single literal (e.g. `"<h2"`), matched by exact substring search.
 * - A set of literals (e.g. `["class=", "<h2"]`), compiled into one
 *   alternation where the earlier literal wins a tie.
 * - A regular expression, matched globally across the whole text.
 */

import config from "../config";
import { isArray, isRegExp, isString } from "../utils/is";
import { PatternError } from "./errors";

import type {
  LiteralSetPattern,
  NormalizedPattern,
  Pattern,
  PatternInput,
  RegexPattern
} from "./_interfaces";

const RE_ESCAPE = /[$()*+.?[\\\]^{|}]/g;

/** Escapes `text` so a regular expression matches it literally. */
export const escapeForRegex = (text: string): string =>
  text.replace(RE_ESCAPE, "\\$&");

/** Tags a caller's search target with its kind. */
export const toPattern = (input: PatternInput): Pattern => {
  if (isString(input)) return Object.freeze({ type: "literal", text: input });
  if (isRegExp(input)) return Object.freeze({ type: "regex", regex: input });
  if (isArray(input)) return Object.freeze({ type: "literalSet", items: input });
  throw new PatternError("Expected a string, an array of strings, or a regular expression.");
};

/**
 * Builds a private copy of `regex` that always matches globally, so
 * the caller's instance and its `lastIndex` are never touched.
 *
 * The sticky flag is dropped; it would stop the scan at the first gap
 * between matches.
 */
const toGlobal = (regex: RegExp): RegExp => {
  const flags = regex.flags.replace(/[gy]/g, "");
  return new RegExp(regex.source, `${flags}g`);
};

const fromLiteralSet = ({ items }: LiteralSetPattern): RegexPattern => {
  if (items.length === 0)
    throw new PatternError("Expected at least one string in the set.");

  // `Array.from` fills holes with `undefined` so they get checked too.
  const escaped = Array.from(items, (item: unknown, i) => {
    if (!isString(item))
      throw new PatternError(`Expected the item at index ${i} to be a string.`);
    if (item.length === 0)
      throw new PatternError(`Expected the item at index ${i} to not be empty.`);
    return escapeForRegex(item);
  });

  const flags = config.locator.literalSetFlags.replace(/[gy]/g, "");

  try {
    const regex = new RegExp(`(?:${escaped.join("|")})`, `${flags}g`);
    return Object.freeze({ type: "regex", regex });
  }
  catch (error) {
    throw new PatternError("Could not compile the set of strings.", { cause: error });
  }
};

/**
 * Readies a pattern for matching.
 *
 * An empty literal, or a set containing one, would match everywhere
 * without advancing, so it is rejected.  A regular expression is allowed
 * to match the empty string; the scan steps past each empty match.
 */
export const normalize = (pattern: Pattern): NormalizedPattern => {
  switch (pattern.type) {
    case "literal": {
      if (pattern.text.length === 0)
        throw new PatternError("Expected a non-empty string to search for.");
      return pattern;
    }
    case "literalSet":
      return fromLiteralSet(pattern);
    case "regex":
      return Object.freeze({ type: "regex", regex: toGlobal(pattern.regex) });
  }
};
