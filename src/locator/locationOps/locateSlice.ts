import { advance, settle } from "./advance";

import type { Cursor, Location, MatchSpan } from "../_interfaces";

/**
 * Finds where the match of `span` begins, given the cursor left by the
 * previous span, and the cursor to hand to the next one.
 */
export const locateSlice = (
  cursor: Cursor,
  span: MatchSpan
): readonly [begin: Location, next: Cursor] => {
  const atMatch = advance(cursor, span.preceding);
  const begin = settle(atMatch, span.matched || span.lookahead);
  return [begin, advance(atMatch, span.matched)];
};
