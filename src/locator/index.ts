import _isSafeInteger from "lodash/isSafeInteger";
import config from "../config";
import { createLogger } from "../utils/logging";
import { isNumber, isString } from "../utils/is";
import { toImmutable } from "../utils/iterables";
import { BEGINNING, createLocation, isLocation } from "./locationOps";
import { matchSpans } from "./MatchStreamService";
import { normalize, toPattern } from "./PatternService";
import { filterAndLimit, locateAll } from "./streamOps";
import {
  LocatorError,
  NotAStringError,
  InvalidAtMostError,
  InvalidStartError,
  success,
  failure
} from "./errors";

import type { AtMost, Location, NormalizedPattern, PatternInput, SearchOptions } from "./_interfaces";
import type { FilterOptions } from "./streamOps";
import type { LocateResult } from "./errors";

const logger = createLogger("Locator");

interface Prepared {
  text: string;
  pattern: NormalizedPattern;
  filterOptions: FilterOptions;
}

const checkAtMost = (atMost: unknown): AtMost => {
  if (atMost === "all") return atMost;
  if (!isNumber(atMost) || !_isSafeInteger(atMost))
    throw new InvalidAtMostError("Expected `atMost` to be an integer or \"all\".");
  if (atMost <= 0)
    throw new InvalidAtMostError("Expected `atMost` to be greater than 0 or \"all\".");
  return atMost;
};

const checkStart = (start: unknown): Location => {
  if (!isLocation(start))
    throw new InvalidStartError("Expected `start` to be `{ line: integer, col: integer }`.");
  return createLocation(start.line, start.col);
};

/** Validates everything up front, so nothing is scanned for a bad call. */
const prepare = (text: unknown, pattern: PatternInput, options: SearchOptions | null): Prepared => {
  if (!isString(text))
    throw new NotAStringError("Expected the text to search to be a string.");

  const searchOptions: SearchOptions = options ?? {};
  const { atMost = "all", start = BEGINNING } = searchOptions;
  const filterOptions = { atMost: checkAtMost(atMost), start: checkStart(start) };

  return { text, pattern: normalize(toPattern(pattern)), filterOptions };
};

const scan = ({ text, pattern, filterOptions }: Prepared): readonly Location[] => {
  const locations = matchSpans(text, pattern);
  return toImmutable(filterAndLimit(locateAll(locations), filterOptions));
};

/**
 * Finds the line and column of each occurrence of `pattern` in `text`.
 *
 * The pattern can be a string, an array of strings, or a regular
 * expression.  Locations are listed in the order found, from top to
 * bottom, left to right.  Both line and column are 1-based and columns
 * are counted in Unicode codepoints.
 *
 * ## Options
 * - `atMost` (positive integer or `"all"`) - at most this many locations
 *   are returned.  Defaults to `"all"`.
 * - `start` (`{ line, col }`) - only locations at or after this point are
 *   returned.  Defaults to the beginning of the text.
 *
 * ## Examples
 * ```ts
 * locate("<h2>\n  <span class=\"a\"", "a");
 * // { ok: true, value: [{ line: 2, col: 6 }, { line: 2, col: 11 }, { line: 2, col: 16 }] }
 *
 * locate("<h2>\n  <span class=\"a\"", ["h", "l"]);
 * // { ok: true, value: [{ line: 1, col: 2 }, { line: 2, col: 10 }] }
 *
 * locate("<h2>\n  <span class=\"a\"", /<(?!h)/);
 * // { ok: true, value: [{ line: 2, col: 3 }] }
 * ```
 */
export const locate = (
  text: string,
  pattern: PatternInput,
  options: SearchOptions = {}
): LocateResult => {
  let prepared: Prepared;
  try {
    prepared = prepare(text, pattern, options);
  }
  catch (error) {
    if (!(error instanceof LocatorError)) throw error;
    logger.warn(`Rejected a search: ${error.message}`);
    return failure(error);
  }

  if (!config.locator.measurePerformance) return success(scan(prepared));

  const stopWatch = logger.stopWatch("locate");
  stopWatch.start();
  const locations = scan(prepared);
  stopWatch.stop();
  return success(locations);
};

/**
 * Like {@link locate}, but returns the locations directly and throws the
 * {@link LocatorError} of a failed search.
 */
export const locateOrThrow = (
  text: string,
  pattern: PatternInput,
  options?: SearchOptions
): readonly Location[] => {
  const result = locate(text, pattern, options);
  if (result.ok) return result.value;
  throw result.error;
};
