import { describe, it, expect } from "@jest/globals";

import * as helpers from "./helpers-locator";

describe("sanity checks for helpers-locator", () => {
  it("loadSample", () => {
    const sample = helpers.loadSample();
    expect(sample.startsWith("<!DOCTYPE html>\n")).toBe(true);
    expect(sample.endsWith("</html>\n")).toBe(true);
  });

  it("offsetsOf", () => {
    expect([...helpers.offsetsOf("aaaa", "aa")]).toEqual([0, 2]);
    expect([...helpers.offsetsOf("abc", "x")]).toEqual([]);
  });

  it("naiveLocate", () => {
    expect(helpers.naiveLocate("ab\r\nxab\nb", "b")).toEqual([
      { line: 1, col: 2 },
      { line: 2, col: 3 },
      { line: 3, col: 1 }
    ]);
  });

  it("countingIterable", () => {
    const { iterable, stats } = helpers.countingIterable([1, 2, 3]);
    const iterator = iterable[Symbol.iterator]();
    iterator.next();
    expect(stats.pulled).toBe(1);
    expect([...iterable]).toEqual([1, 2, 3]);
    expect(stats.pulled).toBe(4);
  });
});
