import _isInteger from "lodash/isInteger";
import { assertInteger } from "../../utils/assert";
import { isObject } from "../../utils/is";

import type { Location } from "../_interfaces";

/** Columns are reported 1-based. */
export const COLUMN_OFFSET = 1;

/** Lines are reported 1-based. */
export const FIRST_LINE = 1;

/**
 * A location before every real location; the default `start` of
 * a search.
 */
export const BEGINNING: Location = Object.freeze({ line: 0, col: 0 });

/** Creates an immutable {@link Location}. */
export const createLocation = (line: number, col: number): Location => {
  assertInteger("Expected `line` to be an integer.", line);
  assertInteger("Expected `col` to be an integer.", col);
  return Object.freeze({ line, col });
};

/** Checks that `value` is a `{ line, col }` record of integers. */
export const isLocation = (value: unknown): value is Location => {
  if (!isObject(value)) return false;
  if (!("line" in value) || !("col" in value)) return false;
  return _isInteger(value.line) && _isInteger(value.col);
};

/**
 * Orders locations from the top of the text to the bottom, then
 * from left to right.  Suitable for {@link Array.sort}.
 */
export const compareLocations = (a: Location, b: Location): number =>
  a.line - b.line || a.col - b.col;

/** Creates a predicate for locations at or after `start`. */
export const isAtOrAfter = (start: Location) =>
  (loc: Location): boolean => compareLocations(loc, start) >= 0;

/**
 * Counts the Unicode codepoints of `text`.  A surrogate pair counts
 * once; a lone surrogate counts once as well.
 */
export const codepointLength = (text: string): number => {
  let count = 0;
  for (const _ of text) count += 1;
  return count;
};
