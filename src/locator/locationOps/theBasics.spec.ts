import { describe, it, expect } from "@jest/globals";

import * as theBasics from "./theBasics";

describe("createLocation", () => {
  const { createLocation } = theBasics;

  it("should create a location from a line and column", () => {
    expect(createLocation(42, 12)).toEqual({ line: 42, col: 12 });
  });

  it("should return a frozen instance", () => {
    expect(Object.isFrozen(createLocation(1, 1))).toBe(true);
  });

  it("should reject parts that are not integers", () => {
    expect(() => createLocation(1.5, 1)).toThrow("Expected `line` to be an integer.");
    expect(() => createLocation(1, NaN)).toThrow("Expected `col` to be an integer.");
  });
});

describe("isLocation", () => {
  const { isLocation } = theBasics;

  it("should accept records of integers", () => {
    expect(isLocation({ line: 2, col: 10 })).toBe(true);
    expect(isLocation({ line: 0, col: 0, extra: "ignored" })).toBe(true);
  });

  it("should reject anything else", () => {
    expect(isLocation(null)).toBe(false);
    expect(isLocation("1:1")).toBe(false);
    expect(isLocation({ line: 1 })).toBe(false);
    expect(isLocation({ line: 1, col: "1" })).toBe(false);
    expect(isLocation({ line: 1, col: 2.5 })).toBe(false);
  });
});

describe("compareLocations", () => {
  const { compareLocations, createLocation } = theBasics;

  it("should order by line, then by column", () => {
    const unsorted = [
      createLocation(2, 1),
      createLocation(1, 9),
      createLocation(2, 0),
      createLocation(1, 3)
    ];

    expect([...unsorted].sort(compareLocations)).toEqual([
      { line: 1, col: 3 },
      { line: 1, col: 9 },
      { line: 2, col: 0 },
      { line: 2, col: 1 }
    ]);
  });

  it("should treat equal locations as equal", () => {
    expect(compareLocations(createLocation(3, 4), createLocation(3, 4))).toBe(0);
  });
});

describe("isAtOrAfter", () => {
  const { isAtOrAfter, createLocation, BEGINNING } = theBasics;
  const check = isAtOrAfter(createLocation(2, 10));

  it("should include the start itself", () => {
    expect(check(createLocation(2, 10))).toBe(true);
  });

  it("should include later columns and later lines", () => {
    expect(check(createLocation(2, 11))).toBe(true);
    expect(check(createLocation(3, 1))).toBe(true);
  });

  it("should exclude earlier columns and earlier lines", () => {
    expect(check(createLocation(2, 9))).toBe(false);
    expect(check(createLocation(1, 50))).toBe(false);
  });

  it("should include every real location when starting at the beginning", () => {
    expect(isAtOrAfter(BEGINNING)(createLocation(1, 1))).toBe(true);
  });
});

describe("codepointLength", () => {
  const { codepointLength } = theBasics;

  it("should count surrogate pairs once", () => {
    expect(codepointLength("a\u{1F600}é")).toBe(3);
  });

  it("should count a lone surrogate once", () => {
    expect(codepointLength("\ud83d")).toBe(1);
  });

  it("should be zero for an empty string", () => {
    expect(codepointLength("")).toBe(0);
  });
});
