import { describe, it, expect } from "vitest";
import { combinations, mergeTerms, splitWords, stripMarkup, stripQualifiers } from "../text";

describe("stripQualifiers", () => {
  it("drops parenthetical parts and tidies spacing", () => {
    expect(stripQualifiers("Aspirin (acetylsalicylic acid)")).toBe("Aspirin");
    expect(stripQualifiers("  Ramipril   (ACE inhibitor) forte ")).toBe("Ramipril forte");
  });
});

describe("splitWords", () => {
  it("ignores brackets and quotes", () => {
    expect(splitWords('"knee" (left)  replacement')).toEqual(["knee", "left", "replacement"]);
  });
});

describe("mergeTerms", () => {
  it("joins words and skips repeats regardless of case", () => {
    expect(mergeTerms("Aspirin (acetylsalicylic acid)", "Acetylsalicylic acid")).toBe(
      "Aspirin acetylsalicylic acid"
    );
  });
});

describe("combinations", () => {
  it("lists subsets in index order", () => {
    expect(combinations(["a", "b", "c"], 2)).toEqual([
      ["a", "b"],
      ["a", "c"],
      ["b", "c"],
    ]);
  });

  it("returns nothing for sizes out of range", () => {
    expect(combinations(["a"], 2)).toEqual([]);
    expect(combinations(["a"], 0)).toEqual([]);
  });
});

describe("stripMarkup", () => {
  it("removes highlight tags", () => {
    expect(stripMarkup("<em class='found'>Type 2</em> diabetes mellitus")).toBe("Type 2 diabetes mellitus");
  });
});
