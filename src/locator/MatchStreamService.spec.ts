import { describe, it, expect } from "@jest/globals";

import { matchSpans } from "./MatchStreamService";

import type { NormalizedPattern } from "./_interfaces";

const literal = (text: string): NormalizedPattern => ({ type: "literal", text });
const regex = (regex: RegExp): NormalizedPattern => ({ type: "regex", regex });

describe("matchSpans", () => {
  describe("with a literal", () => {
    it("should produce a span for each occurrence", () => {
      expect([...matchSpans("a-b-c", literal("-"))]).toEqual([
        { preceding: "a", matched: "-", lookahead: "b" },
        { preceding: "b", matched: "-", lookahead: "c" }
      ]);
    });

    it("should not overlap occurrences", () => {
      expect([...matchSpans("aaa", literal("aa"))]).toEqual([
        { preceding: "", matched: "aa", lookahead: "a" }
      ]);
    });

    it("should produce nothing when there is no occurrence", () => {
      expect([...matchSpans("abc", literal("x"))]).toEqual([]);
      expect([...matchSpans("", literal("x"))]).toEqual([]);
    });
  });

  describe("with a regular expression", () => {
    it("should allow matches across lines", () => {
      expect([...matchSpans("ab\ncd", regex(/b\nc/g))]).toEqual([
        { preceding: "a", matched: "b\nc", lookahead: "d" }
      ]);
    });

    it("should step past empty matches", () => {
      expect([...matchSpans("ab", regex(/x*/g))]).toEqual([
        { preceding: "", matched: "", lookahead: "a" },
        { preceding: "a", matched: "", lookahead: "b" },
        { preceding: "b", matched: "", lookahead: "" }
      ]);
    });

    it("should skip empty matches between the halves of a surrogate pair", () => {
      expect([...matchSpans("\u{1F600}", regex(/(?:)/g))]).toEqual([
        { preceding: "", matched: "", lookahead: "\ud83d" },
        { preceding: "\u{1F600}", matched: "", lookahead: "" }
      ]);
    });

    it("should give an empty lookahead at the end of the text", () => {
      expect([...matchSpans("xy", regex(/y/g))]).toEqual([
        { preceding: "x", matched: "y", lookahead: "" }
      ]);
    });
  });

  it("should cover the text up to the end of the last match", () => {
    const text = "one two one three";
    const rebuilt = [...matchSpans(text, literal("one"))]
      .map(({ preceding, matched }) => preceding + matched)
      .join("");

    expect(rebuilt).toBe("one two one");
  });
});
