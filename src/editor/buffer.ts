import { graphemeCount, graphemeOffset, sliceGraphemes } from "./grapheme.js";

export type Position = { row: number; col: number };

/** Half-open range; `start` is always before or equal to `end` once normalized. */
export type Range = { start: Position; end: Position };

export function comparePositions(a: Position, b: Position): number {
  return a.row === b.row ? a.col - b.col : a.row - b.row;
}

export function normalizeRange(r: Range): Range {
  return comparePositions(r.start, r.end) <= 0
    ? r
    : { start: r.end, end: r.start };
}

export class TextBuffer {
  lines: string[] = [""];
  dirty = false;
  selection: Range | null = null;

  // Lowest row touched since the last takeChangedFrom(); drives highlight invalidation.
  private changedFrom: number | null = 0;

  load(text: string) {
    // Keep trailing newline behavior simple: it shows up as a last empty line.
    this.lines = text.replace(/\r\n/g, "\n").split("\n");
    if (this.lines.length === 0) this.lines = [""];
    this.dirty = false;
    this.selection = null;
    this.changedFrom = 0;
  }

  serialize(): string {
    return this.lines.join("\n");
  }

  markSaved() {
    this.dirty = false;
  }

  lineCount() {
    return this.lines.length;
  }

  lineAt(row: number) {
    return this.lines[row] ?? "";
  }

  lineLength(row: number) {
    return graphemeCount(this.lineAt(row));
  }

  clamp(p: Position): Position {
    const row = Math.max(0, Math.min(p.row, this.lines.length - 1));
    const col = Math.max(0, Math.min(p.col, this.lineLength(row)));
    return { row, col };
  }

  insertChar(row: number, col: number, ch: string) {
    const line = this.lineAt(row);
    const at = graphemeOffset(line, col);
    this.lines[row] = line.slice(0, at) + ch + line.slice(at);
    this.touch(row);
  }

  /** Insert text that may span lines; returns the position after it. */
  insertText(at: Position, text: string): Position {
    const p = this.clamp(at);
    const parts = text.replace(/\r\n/g, "\n").split("\n");
    const line = this.lineAt(p.row);
    const offset = graphemeOffset(line, p.col);
    const before = line.slice(0, offset);
    const after = line.slice(offset);

    if (parts.length === 1) {
      this.lines[p.row] = before + text + after;
      this.touch(p.row);
      return { row: p.row, col: p.col + graphemeCount(text) };
    }

    const last = parts[parts.length - 1] ?? "";
    const middle = parts.slice(1, -1);
    this.lines.splice(p.row, 1, before + parts[0], ...middle, last + after);
    this.touch(p.row);
    return { row: p.row + parts.length - 1, col: graphemeCount(last) };
  }

  /** Remove the text between two positions; returns what was removed. */
  deleteRange(range: Range): string {
    const { start, end } = normalizeRange({
      start: this.clamp(range.start),
      end: this.clamp(range.end),
    });
    if (comparePositions(start, end) === 0) return "";

    const first = this.lineAt(start.row);
    const lastLine = this.lineAt(end.row);
    const head = sliceGraphemes(first, 0, start.col);
    const tail = sliceGraphemes(lastLine, end.col);

    let removed: string;
    if (start.row === end.row) {
      removed = sliceGraphemes(first, start.col, end.col);
    } else {
      removed = [
        sliceGraphemes(first, start.col),
        ...this.lines.slice(start.row + 1, end.row),
        sliceGraphemes(lastLine, 0, end.col),
      ].join("\n");
    }

    this.lines.splice(start.row, end.row - start.row + 1, head + tail);
    this.touch(start.row);
    return removed;
  }

  deleteCharBackward(row: number, col: number): Position {
    if (row < 0) return { row: 0, col: 0 };

    // If at start of line, join with previous
    if (col === 0) {
      if (row === 0) return { row, col };
      const prevLen = this.lineLength(row - 1);
      this.deleteRange({ start: { row: row - 1, col: prevLen }, end: { row, col: 0 } });
      return { row: row - 1, col: prevLen };
    }

    this.deleteRange({ start: { row, col: col - 1 }, end: { row, col } });
    return { row, col: col - 1 };
  }

  /** Delete the grapheme under the cursor, joining the next line at line end. */
  deleteCharForward(row: number, col: number) {
    if (col < this.lineLength(row)) {
      this.deleteRange({ start: { row, col }, end: { row, col: col + 1 } });
    } else if (row < this.lines.length - 1) {
      this.deleteRange({ start: { row, col }, end: { row: row + 1, col: 0 } });
    }
  }

  insertLine(row: number, text: string) {
    const at = Math.max(0, Math.min(row, this.lines.length));
    this.lines.splice(at, 0, text);
    this.touch(at);
  }

  removeLine(row: number): string {
    if (this.lines.length === 1) {
      const removed = this.lines[0] ?? "";
      this.lines[0] = "";
      this.touch(0);
      return removed;
    }
    const [removed] = this.lines.splice(row, 1);
    this.touch(row);
    return removed ?? "";
  }

  /** Lowest row changed since the previous call, or null if nothing changed. */
  takeChangedFrom(): number | null {
    const from = this.changedFrom;
    this.changedFrom = null;
    return from;
  }

  private touch(row: number) {
    this.dirty = true;
    this.changedFrom = this.changedFrom === null ? row : Math.min(this.changedFrom, row);
  }
}
