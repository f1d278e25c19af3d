import { describe, expect, it } from "vitest";

import { DEFAULT_STATE, highlightLine, sameState, type LineState } from "./highlighter.js";
import { compileLanguage, PLAIN_TEXT } from "./language.js";

const mini = compileLanguage({
  name: "mini",
  extensions: [".mini"],
  keywords: ["let"],
  types: ["i32"],
  punctuation: ";(){}",
  operators: "=+",
  lineComment: ["//"],
  blockComment: { open: "/*", close: "*/", nested: true },
  strings: ['"'],
  escape: "\\",
});

function spans(line: string, entry: LineState = DEFAULT_STATE) {
  return [...highlightLine(line, entry, mini)];
}

describe("highlightLine", () => {
  it("classifies keywords, numbers, operators and punctuation", () => {
    expect(spans("let x = 5;")).toEqual([
      { start: 0, end: 3, token: "keyword" },
      { start: 3, end: 6, token: "plain" },
      { start: 6, end: 7, token: "operator" },
      { start: 7, end: 8, token: "plain" },
      { start: 8, end: 9, token: "number" },
      { start: 9, end: 10, token: "punctuation" },
    ]);
  });

  it("treats declared and capitalised words as types", () => {
    expect(spans("i32 Foo")).toEqual([
      { start: 0, end: 3, token: "type" },
      { start: 3, end: 4, token: "plain" },
      { start: 4, end: 7, token: "type" },
    ]);
  });

  it("runs a line comment to the end of the line", () => {
    expect(spans("x // note")).toEqual([
      { start: 0, end: 2, token: "plain" },
      { start: 2, end: 9, token: "comment" },
    ]);
  });

  it("keeps a range operator out of the number", () => {
    expect(spans("0..10")).toEqual([
      { start: 0, end: 1, token: "number" },
      { start: 1, end: 3, token: "plain" },
      { start: 3, end: 5, token: "number" },
    ]);
  });

  it("skips escaped delimiters inside strings", () => {
    const tokens = highlightLine('"a\\"b"', DEFAULT_STATE, mini);
    expect([...tokens]).toEqual([{ start: 0, end: 6, token: "string" }]);
    expect(tokens.endState).toEqual(DEFAULT_STATE);
  });

  it("carries an unterminated string to the next line", () => {
    const first = highlightLine('let s = "abc', DEFAULT_STATE, mini);
    expect([...first].at(-1)).toEqual({ start: 8, end: 12, token: "string" });
    expect(first.endState).toEqual({ kind: "string", delimiter: '"' });

    expect(spans('def" + 1', first.endState)).toEqual([
      { start: 0, end: 4, token: "string" },
      { start: 4, end: 5, token: "plain" },
      { start: 5, end: 6, token: "operator" },
      { start: 6, end: 7, token: "plain" },
      { start: 7, end: 8, token: "number" },
    ]);
  });

  it("tracks nested block comment depth across lines", () => {
    const first = highlightLine("a /* b /* c */", DEFAULT_STATE, mini);
    expect([...first]).toEqual([
      { start: 0, end: 2, token: "plain" },
      { start: 2, end: 14, token: "comment" },
    ]);
    expect(first.endState).toEqual({ kind: "comment", depth: 1 });

    const second = highlightLine("d */ e */ f", first.endState, mini);
    expect([...second]).toEqual([
      { start: 0, end: 4, token: "comment" },
      { start: 4, end: 11, token: "plain" },
    ]);
    expect(second.endState).toEqual(DEFAULT_STATE);
  });

  it("yields the same spans every time it is iterated", () => {
    const tokens = highlightLine("let y = x + 1; // sum", DEFAULT_STATE, mini);
    expect([...tokens]).toEqual([...tokens]);
  });

  it("covers the whole line without gaps", () => {
    const line = 'let s = "x" /* c */ + 2;';
    let at = 0;
    for (const span of highlightLine(line, DEFAULT_STATE, mini)) {
      expect(span.start).toBe(at);
      at = span.end;
    }
    expect(at).toBe(line.length);
  });

  it("leaves everything plain without a language", () => {
    expect([...highlightLine("let x", DEFAULT_STATE, PLAIN_TEXT)]).toEqual([
      { start: 0, end: 5, token: "plain" },
    ]);
  });
});

describe("sameState", () => {
  it("compares the open construct", () => {
    expect(sameState({ kind: "comment", depth: 1 }, { kind: "comment", depth: 1 })).toBe(true);
    expect(sameState({ kind: "comment", depth: 1 }, { kind: "comment", depth: 2 })).toBe(false);
    expect(sameState({ kind: "string", delimiter: '"' }, DEFAULT_STATE)).toBe(false);
  });
});
