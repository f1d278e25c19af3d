import { graphemes } from "../editor/grapheme.js";
import type { RGB } from "./theme.js";

export type Style = {
  fg?: RGB;
  bg?: RGB;
  bold?: boolean;
  dim?: boolean;
  underline?: boolean;
};

export type Segment = { text: string; style: Style };
export type StyledLine = Segment[];

export type Rect = { x: number; y: number; width: number; height: number };

type Cell = { ch: string; style: Style };

const B = { tl: "╭", tr: "╮", bl: "╰", br: "╯", h: "─", v: "│" };

export function styleKey(s: Style): string {
  return [
    s.fg?.join(",") ?? "",
    s.bg?.join(",") ?? "",
    s.bold ? "b" : "",
    s.dim ? "d" : "",
    s.underline ? "u" : "",
  ].join("|");
}

export function inner(r: Rect): Rect {
  return {
    x: r.x + 1,
    y: r.y + 1,
    width: Math.max(0, r.width - 2),
    height: Math.max(0, r.height - 2),
  };
}

/** Fixed grid of cells, one grapheme each. Writes outside the grid are dropped. */
export class Canvas {
  private readonly cells: Cell[][];

  constructor(
    readonly width: number,
    readonly height: number,
    base: Style = {},
  ) {
    this.cells = Array.from({ length: height }, () =>
      Array.from({ length: width }, () => ({ ch: " ", style: base })),
    );
  }

  /** Draws `text` from (x, y), at most `maxWidth` cells; returns the x after the last cell. */
  text(x: number, y: number, text: string, style: Style = {}, maxWidth = Infinity): number {
    const row = this.cells[y];
    if (!row) return x;
    let cx = x;
    const limit = Math.min(this.width, x + Math.max(0, maxWidth));
    for (const g of graphemes(text)) {
      if (cx >= limit) break;
      const cell = row[cx];
      if (cell) row[cx] = { ch: g === "\t" ? " " : g, style: { ...cell.style, ...style } };
      cx++;
    }
    return cx;
  }

  /** Restyle cells without touching their characters. */
  paint(x: number, y: number, width: number, style: Style) {
    const row = this.cells[y];
    if (!row) return;
    for (let cx = Math.max(0, x); cx < Math.min(this.width, x + width); cx++) {
      const cell = row[cx];
      row[cx] = { ch: cell.ch, style: { ...cell.style, ...style } };
    }
  }

  fill(r: Rect, style: Style, ch = " ") {
    for (let y = r.y; y < r.y + r.height; y++) {
      this.text(r.x, y, ch.repeat(Math.max(0, r.width)), style, r.width);
    }
  }

  /** Rounded box with an optional title centred in the top border. */
  box(r: Rect, border: Style, title = "", titleStyle: Style = border) {
    if (r.width < 2 || r.height < 2) return;
    const w = r.width;
    this.text(r.x, r.y, B.tl + B.h.repeat(w - 2) + B.tr, border);
    for (let y = r.y + 1; y < r.y + r.height - 1; y++) {
      this.text(r.x, y, B.v, border);
      this.text(r.x + w - 1, y, B.v, border);
    }
    this.text(r.x, r.y + r.height - 1, B.bl + B.h.repeat(w - 2) + B.br, border);

    if (title && w > 4) {
      const shown = graphemes(` ${title} `).slice(0, w - 4);
      const x = r.x + 1 + Math.floor((w - 2 - shown.length) / 2);
      this.text(x, r.y, shown.join(""), titleStyle);
    }
  }

  /** Rows as runs of equally styled text. */
  lines(): StyledLine[] {
    return this.cells.map((row) => {
      const out: StyledLine = [];
      let key = "";
      for (const cell of row) {
        const k = styleKey(cell.style);
        const last = out[out.length - 1];
        if (last && k === key) last.text += cell.ch;
        else {
          out.push({ text: cell.ch, style: cell.style });
          key = k;
        }
      }
      return out;
    });
  }
}

export function lineText(line: StyledLine): string {
  return line.map((s) => s.text).join("");
}
