import { describe, it, expect } from "@jest/globals";

import { iterLines } from "./iterLines";

describe("iterLines", () => {
  it("should split on every kind of terminator", () => {
    expect([...iterLines("a\r\nb\rc\nd")]).toEqual([
      ["a", 1],
      ["b", 2],
      ["c", 3],
      ["d", 4]
    ]);
  });

  it("should yield one line for text without terminators", () => {
    expect([...iterLines("abc")]).toEqual([["abc", 1]]);
    expect([...iterLines("")]).toEqual([["", 1]]);
  });

  it("should yield an empty last line after a trailing terminator", () => {
    expect([...iterLines("x\n")]).toEqual([["x", 1], ["", 2]]);
  });

  it("should produce lines only as they are pulled", () => {
    const iterator = iterLines("first\nsecond\nthird")[Symbol.iterator]();
    expect(iterator.next().value).toEqual(["first", 1]);
    expect(iterator.next().value).toEqual(["second", 2]);
  });
});
