import { describe, expect, it } from "vitest";

import { COMMANDS, parseCommand } from "./commands.js";

describe("parseCommand", () => {
  it("recognises every listed name", () => {
    for (const entry of COMMANDS) {
      for (const name of entry.names) expect(parseCommand(name)).toEqual(entry.action);
    }
  });

  it("treats aliases as the same command", () => {
    expect(parseCommand("h")).toEqual(parseCommand("hint"));
    expect(parseCommand("wq")).toEqual(parseCommand("x"));
    expect(parseCommand(" c ")).toEqual({ type: "check" });
  });

  it("distinguishes a forced quit", () => {
    expect(parseCommand("q")).toEqual({ type: "quit", force: false });
    expect(parseCommand("q!")).toEqual({ type: "quit", force: true });
  });

  it("suggests the closest long name for a typo", () => {
    expect(parseCommand("chek")).toEqual({ type: "unknown", input: "chek", suggestion: "check" });
    expect(parseCommand("zzz")).toEqual({ type: "unknown", input: "zzz", suggestion: null });
    expect(parseCommand("")).toEqual({ type: "unknown", input: "", suggestion: null });
  });

  it("returns a fresh object each time", () => {
    const a = parseCommand("w");
    expect(a).not.toBe(parseCommand("w"));
  });
});
