import { describe, expect, it } from "vitest";

import { HighlightCache } from "./cache.js";
import { compileLanguage } from "./language.js";

const lang = compileLanguage({
  name: "mini",
  keywords: ["let"],
  blockComment: { open: "/*", close: "*/", nested: false },
});

describe("HighlightCache", () => {
  const lines = ["/* start", "still comment", "*/ let"];

  it("scans the rows above the first visible one once", () => {
    const cache = new HighlightCache(lang);
    const [row] = cache.rows(lines, 2, 1);
    expect([...(row ?? [])]).toEqual([
      { start: 0, end: 2, token: "comment" },
      { start: 2, end: 3, token: "plain" },
      { start: 3, end: 6, token: "keyword" },
    ]);
    expect(cache.scannedLines).toBe(3);

    cache.rows(lines, 2, 1);
    expect(cache.scannedLines).toBe(4);
  });

  it("rescans from an edited row", () => {
    const cache = new HighlightCache(lang);
    cache.rows(lines, 0, 3);
    expect(cache.scannedLines).toBe(3);

    const edited = ["// start", ...lines.slice(1)];
    cache.invalidateFrom(0);
    const [row] = cache.rows(edited, 2, 1);
    expect([...(row ?? [])]).toEqual([
      { start: 0, end: 3, token: "plain" },
      { start: 3, end: 6, token: "keyword" },
    ]);
    expect(cache.scannedLines).toBe(6);
  });

  it("clamps the requested window to the buffer", () => {
    const cache = new HighlightCache(lang);
    expect(cache.rows(lines, 2, 10)).toHaveLength(1);
    expect(cache.rows(lines, 5, 3)).toHaveLength(0);
  });

  it("starts over when the language changes", () => {
    const cache = new HighlightCache(lang);
    cache.rows(lines, 0, 3);
    cache.setLanguage(compileLanguage({ name: "other" }));
    cache.rows(lines, 2, 1);
    expect(cache.scannedLines).toBe(6);
  });
});
