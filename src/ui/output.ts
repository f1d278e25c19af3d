import { graphemes } from "../editor/grapheme.js";
import { inner } from "./canvas.js";
import { computeLayout, type PaneView, type Size } from "./layout.js";

/** Hard-wrap each line to `width` cells. Empty lines stay as one empty row. */
export function wrapLines(lines: readonly string[], width: number): string[] {
  const w = Math.max(1, width);
  const out: string[] = [];
  for (const line of lines) {
    const gs = graphemes(line.replace(/\t/g, "    "));
    if (gs.length === 0) {
      out.push("");
      continue;
    }
    for (let i = 0; i < gs.length; i += w) out.push(gs.slice(i, i + w).join(""));
  }
  return out;
}

export type OutputWindow = {
  rows: string[];
  offset: number;
  total: number;
  visible: number;
};

/** The rows of `lines` the output box shows at `scroll`, with the offset clamped to content. */
export function outputWindow(
  lines: readonly string[],
  size: Size,
  view: PaneView,
  scroll: number,
): OutputWindow {
  const area = inner(computeLayout(size, view).output);
  const wrapped = wrapLines(lines, area.width);
  const maxScroll = Math.max(0, wrapped.length - area.height);
  const offset = Math.max(0, Math.min(scroll, maxScroll));
  return {
    rows: wrapped.slice(offset, offset + area.height),
    offset,
    total: wrapped.length,
    visible: area.height,
  };
}

export function maxOutputScroll(lines: readonly string[], size: Size, view: PaneView): number {
  const w = outputWindow(lines, size, view, 0);
  return Math.max(0, w.total - w.visible);
}
