import { describe, expect, it } from "vitest";

import { normalizeRange, TextBuffer } from "./buffer.js";

function bufferOf(text: string) {
  const b = new TextBuffer();
  b.load(text);
  return b;
}

describe("TextBuffer", () => {
  it("keeps a trailing newline as a last empty line", () => {
    const b = bufferOf("a\r\nb\n");
    expect(b.lines).toEqual(["a", "b", ""]);
    expect(b.serialize()).toBe("a\nb\n");
    expect(b.dirty).toBe(false);
  });

  it("inserts text spanning lines", () => {
    const b = bufferOf("hello world");
    expect(b.insertText({ row: 0, col: 5 }, "\n  x")).toEqual({ row: 1, col: 3 });
    expect(b.lines).toEqual(["hello", "  x world"]);
    expect(b.dirty).toBe(true);
  });

  it("deletes across lines and returns what was removed", () => {
    const b = bufferOf("abc\ndef\nghi");
    expect(b.deleteRange({ start: { row: 2, col: 1 }, end: { row: 0, col: 1 } })).toBe("bc\ndef\ng");
    expect(b.lines).toEqual(["ahi"]);
  });

  it("joins lines on backspace at column 0", () => {
    const b = bufferOf("ab\ncd");
    expect(b.deleteCharBackward(1, 0)).toEqual({ row: 0, col: 2 });
    expect(b.lines).toEqual(["abcd"]);
    expect(b.deleteCharBackward(0, 0)).toEqual({ row: 0, col: 0 });
  });

  it("joins the next line on delete at line end", () => {
    const b = bufferOf("ab\ncd");
    b.deleteCharForward(0, 2);
    expect(b.lines).toEqual(["abcd"]);
    b.deleteCharForward(0, 4);
    expect(b.lines).toEqual(["abcd"]);
  });

  it("addresses columns by grapheme", () => {
    const b = bufferOf("a👍b");
    expect(b.lineLength(0)).toBe(3);
    b.insertChar(0, 2, "!");
    expect(b.lines).toEqual(["a👍!b"]);
    expect(b.deleteRange({ start: { row: 0, col: 1 }, end: { row: 0, col: 2 } })).toBe("👍");
  });

  it("clears rather than removes the only line", () => {
    const b = bufferOf("only");
    expect(b.removeLine(0)).toBe("only");
    expect(b.lines).toEqual([""]);
  });

  it("clamps positions into the text", () => {
    const b = bufferOf("abc\nd");
    expect(b.clamp({ row: 9, col: 9 })).toEqual({ row: 1, col: 1 });
    expect(b.clamp({ row: -1, col: -1 })).toEqual({ row: 0, col: 0 });
  });

  it("reports the lowest changed row once", () => {
    const b = bufferOf("a\nb\nc\nd");
    expect(b.takeChangedFrom()).toBe(0);
    expect(b.takeChangedFrom()).toBeNull();
    b.insertChar(3, 0, "x");
    b.insertLine(1, "new");
    expect(b.takeChangedFrom()).toBe(1);
  });
});

describe("normalizeRange", () => {
  it("puts the earlier position first", () => {
    const a = { row: 1, col: 0 };
    const b = { row: 0, col: 4 };
    expect(normalizeRange({ start: a, end: b })).toEqual({ start: b, end: a });
  });
});
