import { describe, expect, it } from "vitest";

import { Canvas, inner, lineText } from "./canvas.js";

function rows(canvas: Canvas) {
  return canvas.lines().map(lineText);
}

describe("Canvas", () => {
  it("draws a rounded box with a centred title", () => {
    const c = new Canvas(8, 3);
    c.box({ x: 0, y: 0, width: 8, height: 3 }, {}, "ab");
    expect(rows(c)).toEqual(["╭─ ab ─╮", "│      │", "╰──────╯"]);
  });

  it("clips text at the edge and at maxWidth", () => {
    const c = new Canvas(5, 1);
    expect(c.text(3, 0, "hello")).toBe(5);
    expect(c.text(0, 0, "xyz", {}, 2)).toBe(2);
    expect(rows(c)).toEqual(["xy he"]);
    expect(c.text(0, 4, "off grid")).toBe(0);
  });

  it("merges equally styled cells into one segment", () => {
    const fg = [1, 2, 3] as const;
    const c = new Canvas(4, 1, { fg });
    c.text(1, 0, "ab", { bold: true });
    expect(c.lines()[0]).toEqual([
      { text: " ", style: { fg } },
      { text: "ab", style: { fg, bold: true } },
      { text: " ", style: { fg } },
    ]);
  });

  it("restyles without changing characters", () => {
    const c = new Canvas(3, 1);
    c.text(0, 0, "abc");
    c.paint(1, 0, 5, { bg: [9, 9, 9] });
    expect(c.lines()[0]).toEqual([
      { text: "a", style: {} },
      { text: "bc", style: { bg: [9, 9, 9] } },
    ]);
  });

  it("shrinks a rect by its border", () => {
    expect(inner({ x: 2, y: 3, width: 10, height: 1 })).toEqual({ x: 3, y: 4, width: 8, height: 0 });
  });
});
