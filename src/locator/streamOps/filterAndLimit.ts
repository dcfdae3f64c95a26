import { chain, skipUntil, take } from "../../utils/iterables";
import { BEGINNING, isAtOrAfter } from "../locationOps";

import type { AtMost, Location } from "../_interfaces";

export interface FilterOptions {
  atMost: AtMost;
  start: Location;
}

export const DEFAULT_FILTER_OPTIONS: Readonly<FilterOptions> = Object.freeze({
  atMost: "all",
  start: BEGINNING
});

/**
 * Drops the locations before `start`, then keeps at most `atMost` of the
 * rest.
 * 
 * Since locations arrive in increasing order, everything after the first
 * location to reach `start` is kept and nothing is re-sorted.  Once
 * `atMost` locations are kept, `locations` is not pulled again.
 */
export const filterAndLimit = (
  locations: Iterable<Location>,
  options: Readonly<FilterOptions> = DEFAULT_FILTER_OPTIONS
): Location[] => {
  const { atMost, start } = options;
  return chain(locations)
    .thru((iter) => skipUntil(iter, isAtOrAfter(start)))
    .thru((iter) => atMost === "all" ? iter : take(iter, atMost))
    .toArray();
};
