import { readFileSync } from "node:fs";
import { join } from "node:path";
import { chain } from "@utils/iterables";
import { iterLines, codepointLength, createLocation } from "@src/locator/locationOps";

import type { Location } from "@src/locator/_interfaces";

/** The sample document used by the larger tests. */
export const loadSample = (): string =>
  readFileSync(join(__dirname, "fixtures", "sample.html"), "utf8");

/** Yields the code unit offsets of `needle` within `haystack`, without overlap. */
export const offsetsOf = function*(haystack: string, needle: string): Iterable<number> {
  let index = haystack.indexOf(needle);
  while (index !== -1) {
    yield index;
    index = haystack.indexOf(needle, index + needle.length);
  }
};

/**
 * A deliberately simple locator that searches each line on its own.
 * Only good for needles that do not contain a line terminator.
 */
export const naiveLocate = (text: string, needle: string): Location[] =>
  chain(iterLines(text))
    .thru(function*(lines) {
      for (const [content, line] of lines)
        for (const offset of offsetsOf(content, needle))
          yield createLocation(line, codepointLength(content.slice(0, offset)) + 1);
    })
    .toArray();

/** Produces the given values, counting how many were pulled. */
export const countingIterable = <T>(values: readonly T[]) => {
  const stats = { pulled: 0 };
  const iterable = {
    *[Symbol.iterator]() {
      for (const value of values) {
        stats.pulled += 1;
        yield value;
      }
    }
  };
  return { iterable, stats };
};
