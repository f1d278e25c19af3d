import { describe, expect, it } from "vitest";

import { centerRect, computeLayout } from "./layout.js";

describe("computeLayout", () => {
  it("stacks header, editor, output, progress and status", () => {
    const l = computeLayout({ width: 80, height: 24 }, "editor");
    expect(l.header).toEqual({ x: 0, y: 0, width: 80, height: 1 });
    expect(l.editor).toEqual({ x: 0, y: 1, width: 80, height: 13 });
    expect(l.output).toEqual({ x: 0, y: 14, width: 80, height: 8 });
    expect(l.progress).toEqual({ x: 0, y: 22, width: 80, height: 1 });
    expect(l.status).toEqual({ x: 0, y: 23, width: 80, height: 1 });
    expect(l.solution).toBeNull();
  });

  it("splits the main area for the solution", () => {
    const l = computeLayout({ width: 81, height: 24 }, "solution");
    expect(l.editor).toEqual({ x: 0, y: 1, width: 40, height: 13 });
    expect(l.solution).toEqual({ x: 40, y: 1, width: 41, height: 13 });
  });

  it("gives the expanded output the editor's rows", () => {
    const l = computeLayout({ width: 80, height: 24 }, "expanded-output");
    expect(l.editor).toBeNull();
    expect(l.output).toEqual({ x: 0, y: 1, width: 80, height: 21 });
  });

  it("shrinks the footer before the editor on short terminals", () => {
    const l = computeLayout({ width: 40, height: 10 }, "editor");
    expect(l.editor).toEqual({ x: 0, y: 1, width: 40, height: 3 });
    expect(l.output).toEqual({ x: 0, y: 4, width: 40, height: 4 });
  });
});

describe("centerRect", () => {
  it("centres and shrinks to fit", () => {
    expect(centerRect({ x: 0, y: 0, width: 10, height: 10 }, 4, 20)).toEqual({
      x: 3,
      y: 0,
      width: 4,
      height: 10,
    });
  });
});
