import { describe, expect, it } from "vitest";

import { closestMatch, fuzzyFind, fuzzyScore } from "./fuzzy.js";

describe("fuzzyScore", () => {
  it("rewards contiguous early matches", () => {
    expect(fuzzyScore("chk", "check")).toBe(68);
    expect(fuzzyScore("CH", "check")).toBe(52);
  });

  it("returns -1 when the query is not a subsequence", () => {
    expect(fuzzyScore("xyz", "check")).toBe(-1);
  });

  it("scores an empty query as 0", () => {
    expect(fuzzyScore("", "check")).toBe(0);
  });
});

describe("fuzzyFind", () => {
  it("sorts by score and keeps ties in input order", () => {
    const hits = fuzzyFind("ab", ["xab", "ab", "a_b", "zz"], (s) => s);
    expect(hits.map((h) => [h.item, h.score])).toEqual([
      ["ab", 55],
      ["xab", 49],
      ["a_b", 49],
    ]);
  });
});

describe("closestMatch", () => {
  it("ignores blank queries and weak matches", () => {
    expect(closestMatch("  ", ["help"])).toBeNull();
    expect(closestMatch("hp", ["help"], 1000)).toBeNull();
    expect(closestMatch("hlp", ["help", "hint"])).toBe("help");
  });
});
