import config from "../../config";
import { assert } from "../../utils/assert";
import { accumulate, chain } from "../../utils/iterables";
import { START_CURSOR, compareLocations, locateSlice } from "../locationOps";

import type { UndefOr } from "../../utils/utility-types";
import type { Location, MatchSpan } from "../_interfaces";

/** Asserts, lazily, that each location comes after the one before it. */
const checkOrdering = function*(locations: Iterable<Location>): Iterable<Location> {
  let prev: UndefOr<Location> = undefined;
  for (const loc of locations) {
    if (prev) assert(
      "Expected locations to be strictly increasing.",
      compareLocations(prev, loc) < 0
    );
    prev = loc;
    yield loc;
  }
};

/**
 * Folds the spans of the match stream through the position accumulator,
 * yielding the begin location of each match as it is pulled.
 */
export const locateAll = (spans: Iterable<MatchSpan>): Iterable<Location> => {
  const locations = accumulate(spans, START_CURSOR, locateSlice);
  // Sanity check the ordering if thorough checking is enabled.
  if (config.debugLogging || config.inTestEnv)
    return chain(locations).thru(checkOrdering).value();
  return locations;
};
