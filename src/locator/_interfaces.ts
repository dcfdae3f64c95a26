/**
 * A position in a body of text.  Both parts are 1-based and `col` is
 * counted in Unicode codepoints from the start of the line.
 */
export interface Location {
  readonly line: number;
  readonly col: number;
}

/**
 * The state threaded through the text while positions are being
 * accumulated.
 */
export interface Cursor extends Location {
  /**
   * Set when the text consumed so far ended with a `"\r"`.  It cannot be
   * known yet if it stands alone as a line terminator or is the first
   * half of a `"\r\n"`, so the line break has not been applied.
   */
  readonly pendingBreak: boolean;
}

/** A search target, as accepted from callers. */
export type PatternInput = string | readonly string[] | RegExp;

export interface LiteralPattern {
  readonly type: "literal";
  readonly text: string;
}

export interface LiteralSetPattern {
  readonly type: "literalSet";
  readonly items: readonly string[];
}

export interface RegexPattern {
  readonly type: "regex";
  readonly regex: RegExp;
}

export type Pattern = LiteralPattern | LiteralSetPattern | RegexPattern;

/** A pattern that is ready to be matched against. */
export type NormalizedPattern = LiteralPattern | RegexPattern;

/** The cap on the number of locations; `"all"` means no cap. */
export type AtMost = number | "all";

export interface SearchOptions {
  /**
   * The maximum number of locations to report.
   * 
   * Defaults to `"all"`.
   */
  atMost?: AtMost;
  /**
   * Only locations at or after this one are reported.
   * 
   * Defaults to the beginning of the text.
   */
  start?: Location;
}

/**
 * One occurrence of a pattern, as produced by the match stream.
 * 
 * Concatenating every `preceding` and `matched`, in order, rebuilds the
 * text up to the end of the last match.
 */
export interface MatchSpan {
  /** The text between the end of the previous match and this one. */
  readonly preceding: string;
  /** The text of the match itself. */
  readonly matched: string;
  /**
   * The single code unit that follows the match, or an empty string
   * at the end of the text.
   */
  readonly lookahead: string;
}
