import { DEFAULT_STATE, highlightLine, type LineState, type LineTokens } from "./highlighter.js";
import type { Language } from "./language.js";

/**
 * Remembers the state each line starts in so a redraw only scans the rows
 * on screen plus whatever lies between the last known row and the first
 * visible one.
 */
export class HighlightCache {
  // entry[i] is the state line i starts in; valid for every i < entry.length.
  private entry: LineState[] = [DEFAULT_STATE];
  scannedLines = 0;

  constructor(private language: Language) {}

  setLanguage(language: Language) {
    this.language = language;
    this.reset();
  }

  reset() {
    this.entry = [DEFAULT_STATE];
  }

  /** An edit on `row` can change what every later line starts in. */
  invalidateFrom(row: number) {
    this.entry.length = Math.max(1, Math.min(this.entry.length, row + 1));
  }

  rows(lines: readonly string[], from: number, count: number): LineTokens[] {
    const start = Math.max(0, Math.min(from, lines.length));
    const end = Math.max(start, Math.min(lines.length, start + count));

    // Walk forward from the last known entry state up to the first visible row.
    while (this.entry.length <= start) {
      const row = this.entry.length - 1;
      this.entry.push(this.scan(lines[row] ?? "", row).endState);
    }

    const out: LineTokens[] = [];
    for (let row = start; row < end; row++) {
      const tokens = this.scan(lines[row] ?? "", row);
      out.push(tokens);
      if (this.entry.length === row + 1) this.entry.push(tokens.endState);
    }
    return out;
  }

  private scan(line: string, row: number): LineTokens {
    this.scannedLines++;
    return highlightLine(line, this.entry[row] ?? DEFAULT_STATE, this.language);
  }
}
