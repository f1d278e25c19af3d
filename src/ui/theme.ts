import type { TokenClass } from "../highlight/highlighter.js";

export type RGB = readonly [number, number, number];

// ─── Palette ─────────────────────────────────────────────────────────────────

export const P = {
  bg:       [30,  31,  41 ] as const,
  panel:    [40,  42,  54 ] as const,
  border:   [68,  71,  90 ] as const,
  primary:  [255, 121, 63 ] as const,
  accent:   [255, 184, 108] as const,
  success:  [80,  250, 123] as const,
  error:    [255, 85,  85 ] as const,
  info:     [139, 233, 253] as const,
  text:     [248, 248, 242] as const,
  dim:      [189, 193, 215] as const,
  muted:    [98,  114, 164] as const,
  selection:[68,  71,  90 ] as const,
} satisfies Record<string, RGB>;

// Narrow glyphs only: every grapheme is drawn into one cell.
export const ICON = {
  pass: "✓",
  fail: "✗",
  run: "»",
  hint: "?",
  info: "ℹ",
  modified: "●",
  marker: "●",
  brand: "◆",
  sep: "│",
  bar: "━",
} as const;

export const TOKEN_COLORS: Record<TokenClass, RGB> = {
  plain: P.text,
  keyword: [255, 121, 198],
  type: P.info,
  string: [241, 250, 140],
  comment: P.muted,
  number: [189, 147, 249],
  punctuation: P.dim,
  operator: [255, 121, 198],
};

export type Tone = "info" | "success" | "error" | "warning" | "hint";

export const TONE_COLORS: Record<Tone, RGB> = {
  info: P.info,
  success: P.success,
  error: P.error,
  warning: P.accent,
  hint: P.accent,
};

export function hex([r, g, b]: RGB): string {
  return "#" + [r, g, b].map((n) => n.toString(16).padStart(2, "0")).join("");
}
