const segmenter = new Intl.Segmenter(undefined, { granularity: "grapheme" });

/** Split a line into grapheme clusters (what the cursor steps over). */
export function graphemes(line: string): string[] {
  // Fast path: plain ASCII lines are one grapheme per code unit.
  if (/^[\x00-\x7f]*$/.test(line)) return line.split("");
  return Array.from(segmenter.segment(line), (s) => s.segment);
}

export function graphemeCount(line: string): number {
  return graphemes(line).length;
}

/** String index where grapheme `col` starts; clamps to the line length. */
export function graphemeOffset(line: string, col: number): number {
  if (col <= 0) return 0;
  let offset = 0;
  let i = 0;
  for (const g of graphemes(line)) {
    if (i === col) return offset;
    offset += g.length;
    i++;
  }
  return line.length;
}

/** Slice a line by grapheme columns. */
export function sliceGraphemes(line: string, start: number, end?: number): string {
  const from = graphemeOffset(line, start);
  const to = end === undefined ? line.length : graphemeOffset(line, end);
  return line.slice(from, Math.max(from, to));
}

export function isWhitespace(g: string | undefined): boolean {
  return g !== undefined && /^\s+$/.test(g);
}
