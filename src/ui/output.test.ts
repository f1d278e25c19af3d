import { describe, expect, it } from "vitest";

import { maxOutputScroll, outputWindow, wrapLines } from "./output.js";

describe("wrapLines", () => {
  it("hard-wraps and expands tabs", () => {
    expect(wrapLines(["abcdef", "", "\tx"], 4)).toEqual(["abcd", "ef", "", "    ", "x"]);
  });
});

describe("outputWindow", () => {
  const lines = Array.from({ length: 20 }, (_, i) => `line ${i}`);
  const size = { width: 80, height: 24 };

  it("clamps the scroll offset to the content", () => {
    const win = outputWindow(lines, size, "editor", 100);
    expect(win.offset).toBe(14);
    expect(win.visible).toBe(6);
    expect(win.total).toBe(20);
    expect(win.rows).toEqual(lines.slice(14));
    expect(maxOutputScroll(lines, size, "editor")).toBe(14);
  });

  it("shows more rows when expanded", () => {
    expect(maxOutputScroll(lines, size, "expanded-output")).toBe(1);
  });
});
