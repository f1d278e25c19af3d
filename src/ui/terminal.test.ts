import { describe, expect, it } from "vitest";

import { toTagged } from "./terminal.js";

describe("toTagged", () => {
  it("wraps styled segments in tags and escapes braces", () => {
    const tagged = toTagged([
      [
        { text: " ", style: {} },
        { text: "a{b}", style: { fg: [255, 0, 0], bg: [0, 0, 16], bold: true } },
      ],
      [{ text: "x", style: { underline: true } }],
    ]);
    expect(tagged).toBe(" {#ff0000-fg}{#000010-bg}{bold}a{open}b{close}{/}\n{underline}x{/}");
  });
});
