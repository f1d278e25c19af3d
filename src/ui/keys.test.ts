import { describe, expect, it } from "vitest";

import { Editor } from "../editor/editor.js";
import { normalizeKey } from "./keys.js";

describe("normalizeKey", () => {
  it("maps terminal aliases onto named keys", () => {
    expect(normalizeKey("\n", { name: "enter" })).toEqual({ name: "enter", ch: null, ctrl: false, shift: false });
    expect(normalizeKey("\x1b", { name: "escape" })).toEqual({ name: "escape", ch: null, ctrl: false, shift: false });
  });

  it("names printable keys by their character", () => {
    expect(normalizeKey("J", { name: "j", shift: true })).toEqual({ name: "J", ch: "J", ctrl: false, shift: true });
    expect(normalizeKey(":", {})).toEqual({ name: ":", ch: ":", ctrl: false, shift: false });
  });

  it("keeps modifiers on control and arrow keys", () => {
    expect(normalizeKey("\x0f", { name: "o", ctrl: true })).toEqual({ name: "o", ch: null, ctrl: true, shift: false });
    expect(normalizeKey(undefined, { name: "right", shift: true })).toEqual({
      name: "right",
      ch: null,
      ctrl: false,
      shift: true,
    });
  });

  it("ignores events with nothing to name", () => {
    expect(normalizeKey(undefined, undefined)).toBeNull();
  });

  it("turns the two events of one carriage return into a single enter", () => {
    const events: Array<[string, { name: string }]> = [
      ["\r", { name: "enter" }],
      ["\r", { name: "return" }],
    ];
    const keys = events.flatMap(([ch, raw]) => normalizeKey(ch, raw) ?? []);
    expect(keys).toEqual([{ name: "enter", ch: null, ctrl: false, shift: false }]);

    const editor = new Editor();
    editor.load("ab");
    editor.setCursor({ row: 0, col: 1 });
    editor.setMode("INSERT");
    for (const k of keys) editor.handleKey(k);
    expect(editor.serialize()).toBe("a\nb");
  });
});
