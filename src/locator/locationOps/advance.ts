import { COLUMN_OFFSET, FIRST_LINE, createLocation, codepointLength } from "./theBasics";

import type { Cursor, Location } from "../_interfaces";

const CR = 0x0d;
const LF = 0x0a;

/** Creates an immutable {@link Cursor}. */
export const createCursor = (line: number, col: number, pendingBreak = false): Cursor =>
  Object.freeze({ ...createLocation(line, col), pendingBreak });

/** The cursor before any text has been consumed. */
export const START_CURSOR: Cursor = createCursor(FIRST_LINE, COLUMN_OFFSET);

/**
 * Moves `cursor` past `slice`.
 * 
 * Line terminators are recognized in the order `"\r\n"`, `"\n"`, then
 * `"\r"`, so a `"\r\n"` is only ever one terminator.  A `"\r"` at the
 * very end of `slice` takes up a column until the next slice shows
 * whether a `"\n"` completes it.
 */
export const advance = (cursor: Cursor, slice: string): Cursor => {
  if (slice.length === 0) return cursor;

  let { line, col } = cursor;
  let from = 0;

  if (cursor.pendingBreak) {
    line += 1;
    col = COLUMN_OFFSET;
    // This `"\n"` belongs to the `"\r"` we were holding on to.
    if (slice.charCodeAt(0) === LF) from = 1;
  }

  const pendingBreak = slice.charCodeAt(slice.length - 1) === CR;
  const to = pendingBreak ? slice.length - 1 : slice.length;

  let terminators = 0;
  let tailStart = from;
  for (let i = from; i < to; i++) {
    const code = slice.charCodeAt(i);
    if (code !== CR && code !== LF) continue;
    if (code === CR && slice.charCodeAt(i + 1) === LF) i += 1;
    terminators += 1;
    tailStart = i + 1;
  }

  const tailLength = codepointLength(slice.slice(tailStart, to)) + (pendingBreak ? 1 : 0);

  if (terminators === 0)
    return createCursor(line, col + tailLength, pendingBreak);
  return createCursor(line + terminators, tailLength + COLUMN_OFFSET, pendingBreak);
};

/**
 * Converts a cursor into the location of whatever begins at it.
 * 
 * When a `"\r"` is pending, the location moves to the start of the next
 * line unless `upcoming` begins with the `"\n"` completing the `"\r\n"`.
 */
export const settle = (cursor: Cursor, upcoming: string): Location => {
  if (cursor.pendingBreak && !upcoming.startsWith("\n"))
    return createLocation(cursor.line + 1, COLUMN_OFFSET);
  return createLocation(cursor.line, cursor.col);
};
