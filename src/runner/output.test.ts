import { describe, expect, it } from "vitest";

import { OutputCollector, stripAnsi, toLines } from "./output.js";

describe("stripAnsi", () => {
  it("removes colour and hyperlink sequences", () => {
    expect(stripAnsi("\x1b[1;31merror\x1b[0m: \x1b]8;;http://x\x07link\x1b]8;;\x07")).toBe("error: link");
  });
});

describe("toLines", () => {
  it("drops surrounding blank lines and trailing spaces", () => {
    expect(toLines("\r\n\nerror: bad  \r\n  --> a.ts:1\n\n")).toEqual(["error: bad", "  --> a.ts:1"]);
  });

  it("returns nothing for blank output", () => {
    expect(toLines(" \n\n")).toEqual([]);
  });
});

describe("OutputCollector", () => {
  it("keeps chunks in order up to the limit", () => {
    const out = new OutputCollector(8);
    out.push("abc");
    out.push(Buffer.from("defgh"));
    expect(out.truncated).toBe(false);
    out.push("ij");
    expect(out.text()).toBe("abcdefgh");
    expect(out.truncated).toBe(true);
  });

  it("cuts a chunk that crosses the limit", () => {
    const out = new OutputCollector(4);
    out.push("abcdef");
    expect(out.text()).toBe("abcd");
    expect(out.truncated).toBe(true);
  });

  it("drops a character the limit cuts in half", () => {
    const out = new OutputCollector(4);
    out.push("aéé");
    expect(out.text()).toBe("aé");
    expect(out.truncated).toBe(true);
  });

  it("drops a character split across chunks at the limit", () => {
    const out = new OutputCollector(3);
    out.push("ab");
    out.push("€");
    expect(out.text()).toBe("ab");
  });

  it("keeps a character that ends exactly at the limit", () => {
    const out = new OutputCollector(3);
    out.push("aé!");
    expect(out.text()).toBe("aé");
  });
});
