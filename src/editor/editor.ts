import { normalizeRange, TextBuffer, type Position, type Range } from "./buffer.js";
import { parseCommand, type CommandAction } from "./commands.js";
import { graphemes, isWhitespace } from "./grapheme.js";
import { getHints, sequenceMap, stepSequence, type EditId } from "./keymap.js";
import type { Direction, EditorState, KeyInput, Mode, Unit } from "./state.js";
import { HighlightCache } from "../highlight/cache.js";
import type { LineTokens } from "../highlight/highlighter.js";
import { PLAIN_TEXT, type Language } from "../highlight/language.js";

/** NORMAL-mode keys the editor does not own; the session acts on them. */
export type SessionIntent =
  | { type: "toggle-solution" }
  | { type: "next" }
  | { type: "previous" }
  | { type: "scroll-output"; delta: number }
  | { type: "output-top" }
  | { type: "output-bottom" }
  | { type: "toggle-expanded-output" }
  | { type: "quit" };

export type EditorOutcome =
  | { type: "none" }
  | { type: "command"; action: CommandAction }
  | { type: "intent"; intent: SessionIntent };

export type EditorOptions = {
  tabWidth?: number;
  language?: Language;
};

const NONE: EditorOutcome = { type: "none" };

// Last yanked or deleted text. Whole lines paste as lines.
type Register = { text: string; linewise: boolean };

const AUTO_PAIRS: Record<string, string> = {
  "(": ")",
  "{": "}",
  "[": "]",
  '"': '"',
  "'": "'",
};
const CLOSERS = new Set([")", "}", "]", '"', "'"]);

const NORMAL_INTENTS: Record<string, SessionIntent> = {
  s: { type: "toggle-solution" },
  n: { type: "next" },
  "]": { type: "next" },
  p: { type: "previous" },
  "[": { type: "previous" },
  J: { type: "scroll-output", delta: 5 },
  K: { type: "scroll-output", delta: -5 },
  pagedown: { type: "scroll-output", delta: 10 },
  pageup: { type: "scroll-output", delta: -10 },
  home: { type: "output-top" },
  end: { type: "output-bottom" },
  q: { type: "quit" },
};

const ARROWS: Record<string, Direction> = {
  left: "left",
  right: "right",
  up: "up",
  down: "down",
};

export class Editor {
  readonly buffer = new TextBuffer();
  readonly state: EditorState = {
    mode: "NORMAL",
    cursor: { row: 0, col: 0 },
    preferredCol: 0,
    scrollTop: 0,
    pending: null,
    commandLine: "",
    statusMessage: "",
  };
  private readonly highlight: HighlightCache;
  private readonly tabWidth: number;
  private register: Register | null = null;

  constructor(options: EditorOptions = {}) {
    this.tabWidth = options.tabWidth ?? 4;
    this.highlight = new HighlightCache(options.language ?? PLAIN_TEXT);
  }

  get mode(): Mode {
    return this.state.mode;
  }

  get cursor(): Position {
    return { ...this.state.cursor };
  }

  get dirty() {
    return this.buffer.dirty;
  }

  get selection(): Range | null {
    return this.buffer.selection ? normalizeRange(this.buffer.selection) : null;
  }

  load(text: string, language?: Language) {
    this.buffer.load(text);
    if (language) this.highlight.setLanguage(language);
    else this.highlight.reset();
    this.state.mode = "NORMAL";
    this.state.cursor = { row: 0, col: 0 };
    this.state.preferredCol = 0;
    this.state.scrollTop = 0;
    this.state.pending = null;
    this.state.commandLine = "";
    this.state.statusMessage = "";
  }

  serialize(): string {
    return this.buffer.serialize();
  }

  markSaved() {
    this.buffer.markSaved();
  }

  // ─── Mode state machine ─────────────────────────────────────────────────

  /**
   * INSERT and COMMAND are entered only from NORMAL; every mode may return
   * to NORMAL. Rejected transitions change nothing and return false.
   */
  setMode(next: Mode): boolean {
    const from = this.state.mode;
    if (next !== "NORMAL" && from !== "NORMAL") return false;

    this.state.pending = null;
    if (from === "COMMAND" || next === "COMMAND") this.state.commandLine = "";
    if (from === "INSERT" && next === "NORMAL") this.buffer.selection = null;
    this.state.mode = next;
    return true;
  }

  /** Leaves COMMAND mode and hands the action to whoever owns it. */
  applyCommand(action: CommandAction): CommandAction {
    if (this.state.mode === "COMMAND") this.setMode("NORMAL");
    return action;
  }

  // ─── Cursor ─────────────────────────────────────────────────────────────

  moveCursor(direction: Direction, unit: Unit) {
    const b = this.buffer;
    const { row, col } = b.clamp(this.state.cursor);
    const vertical = direction === "up" || direction === "down";
    let next: Position = { row, col };

    if (unit === "line") {
      if (direction === "left") next = { row, col: 0 };
      if (direction === "right") next = { row, col: b.lineLength(row) };
      if (direction === "up") next = { row: 0, col: this.state.preferredCol };
      if (direction === "down") next = { row: b.lineCount() - 1, col: this.state.preferredCol };
    } else if (vertical) {
      const delta = direction === "up" ? -1 : 1;
      next = { row: row + delta, col: this.state.preferredCol };
    } else if (unit === "word") {
      next = direction === "right" ? this.wordForward(row, col) : this.wordBackward(row, col);
    } else if (direction === "left") {
      // Wraps to the end of the previous line.
      if (col > 0) next = { row, col: col - 1 };
      else if (row > 0) next = { row: row - 1, col: b.lineLength(row - 1) };
    } else {
      if (col < b.lineLength(row)) next = { row, col: col + 1 };
      else if (row < b.lineCount() - 1) next = { row: row + 1, col: 0 };
    }

    this.state.cursor = b.clamp(next);
    if (!vertical) this.state.preferredCol = this.state.cursor.col;
  }

  setCursor(p: Position) {
    this.state.cursor = this.buffer.clamp(p);
    this.state.preferredCol = this.state.cursor.col;
  }

  /** Keep the cursor inside a viewport `height` rows tall. */
  scrollToCursor(height: number) {
    const h = Math.max(1, height);
    const { row } = this.state.cursor;
    if (row < this.state.scrollTop) this.state.scrollTop = row;
    if (row >= this.state.scrollTop + h) this.state.scrollTop = row - h + 1;
    const maxTop = Math.max(0, this.buffer.lineCount() - 1);
    this.state.scrollTop = Math.max(0, Math.min(this.state.scrollTop, maxTop));
  }

  // ─── Editing ────────────────────────────────────────────────────────────

  insertChar(ch: string) {
    this.deleteSelection();
    const { row, col } = this.buffer.clamp(this.state.cursor);
    this.setCursor(this.buffer.insertText({ row, col }, ch));
  }

  deleteRange(range: Range): string {
    const { start } = normalizeRange(range);
    const removed = this.buffer.deleteRange(range);
    this.buffer.selection = null;
    this.setCursor(start);
    return removed;
  }

  /** Rows [from, from + count) with spans; earlier rows are scanned only as far as needed. */
  visibleLines(from: number, count: number): LineTokens[] {
    const changed = this.buffer.takeChangedFrom();
    if (changed !== null) this.highlight.invalidateFrom(changed);
    return this.highlight.rows(this.buffer.lines, from, count);
  }

  pendingHints(): Array<{ key: string; title: string }> {
    return this.state.pending ? getHints(this.state.pending.node) : [];
  }

  // ─── Keys ───────────────────────────────────────────────────────────────

  handleKey(key: KeyInput): EditorOutcome {
    switch (this.state.mode) {
      case "NORMAL":
        return this.normalKey(key);
      case "INSERT":
        return this.insertKey(key);
      case "COMMAND":
        return this.commandKey(key);
    }
  }

  private normalKey(key: KeyInput): EditorOutcome {
    const { name } = key;

    if (this.state.pending) return this.continueSequence(key);

    if (key.ctrl) {
      if (name === "o") return { type: "intent", intent: { type: "toggle-expanded-output" } };
      return NONE;
    }

    const intent = own(NORMAL_INTENTS, name);
    if (intent) return { type: "intent", intent };

    const started = stepSequence(sequenceMap, name);
    if (started) {
      this.state.pending = { node: started, seq: [name] };
      return NONE;
    }

    const arrow = own(ARROWS, name);
    if (arrow) {
      this.moveCursor(arrow, "char");
      return NONE;
    }

    switch (name) {
      case "escape":
        this.state.statusMessage = "";
        break;
      case ":":
        this.setMode("COMMAND");
        break;
      case "i":
        this.setMode("INSERT");
        break;
      case "a":
        if (this.state.cursor.col < this.buffer.lineLength(this.state.cursor.row)) {
          this.setCursor({ ...this.state.cursor, col: this.state.cursor.col + 1 });
        }
        this.setMode("INSERT");
        break;
      case "A":
        this.moveCursor("right", "line");
        this.setMode("INSERT");
        break;
      case "o":
        this.openLine(this.state.cursor.row + 1);
        break;
      case "O":
        this.openLine(this.state.cursor.row);
        break;
      case "h":
        this.moveCursor("left", "char");
        break;
      case "l":
        this.moveCursor("right", "char");
        break;
      case "j":
        this.moveCursor("down", "char");
        break;
      case "k":
        this.moveCursor("up", "char");
        break;
      case "w":
        this.moveCursor("right", "word");
        break;
      case "b":
        this.moveCursor("left", "word");
        break;
      case "0":
        this.moveCursor("left", "line");
        break;
      case "$":
        this.moveCursor("right", "line");
        break;
      case "G":
        this.state.preferredCol = 0;
        this.moveCursor("down", "line");
        break;
      case "P":
        this.paste();
        break;
      case "x": {
        const { row, col } = this.state.cursor;
        if (col < this.buffer.lineLength(row)) {
          this.deleteRange({ start: { row, col }, end: { row, col: col + 1 } });
        }
        break;
      }
    }
    return NONE;
  }

  private continueSequence(key: KeyInput): EditorOutcome {
    const pending = this.state.pending;
    if (!pending) return NONE;
    this.state.pending = null;
    if (key.name === "escape") return NONE;

    if (pending.node.kind === "arg") {
      if (key.ch && !key.ctrl) this.runEdit(pending.node.editId, key.ch);
      return NONE;
    }

    const next = stepSequence(pending.node, key.name);
    const seq = [...pending.seq, key.name];
    if (!next) {
      this.state.statusMessage = `No binding for: ${seq.join(" ")}`;
      return NONE;
    }
    if (next.kind === "cmd") {
      this.runEdit(next.editId);
      return NONE;
    }
    this.state.pending = { node: next, seq };
    return NONE;
  }

  private runEdit(id: EditId, argument?: string) {
    const { row, col } = this.buffer.clamp(this.state.cursor);
    switch (id) {
      case "line.delete":
        this.register = { text: this.buffer.removeLine(row), linewise: true };
        this.setCursor({ row: Math.min(row, this.buffer.lineCount() - 1), col });
        break;
      case "word.delete-inner":
      case "word.change-inner": {
        const range = this.wordRange(row, col, false);
        if (range) this.register = { text: this.deleteRange(range), linewise: false };
        if (id === "word.change-inner") this.setMode("INSERT");
        break;
      }
      case "word.delete-around":
      case "word.change-around": {
        const range = this.wordRange(row, col, true);
        if (range) this.register = { text: this.deleteRange(range), linewise: false };
        if (id === "word.change-around") this.setMode("INSERT");
        break;
      }
      case "line.yank":
        this.register = { text: this.buffer.lineAt(row), linewise: true };
        this.state.statusMessage = "Yanked 1 line";
        break;
      case "cursor.first-line":
        this.state.preferredCol = 0;
        this.moveCursor("up", "line");
        break;
      case "char.replace":
        if (argument !== undefined && col < this.buffer.lineLength(row)) {
          this.buffer.deleteRange({ start: { row, col }, end: { row, col: col + 1 } });
          this.buffer.insertText({ row, col }, argument);
          this.setCursor({ row, col });
        }
        break;
    }
  }

  /** Lines go above the cursor line; anything else goes in at the cursor. */
  private paste() {
    const reg = this.register;
    if (!reg) return;
    const { row, col } = this.buffer.clamp(this.state.cursor);
    if (reg.linewise) {
      this.buffer.insertLine(row, reg.text);
      this.setCursor({ row, col: 0 });
    } else {
      this.setCursor(this.buffer.insertText({ row, col }, reg.text));
    }
  }

  private insertKey(key: KeyInput): EditorOutcome {
    const { name } = key;

    if (name === "escape") {
      this.setMode("NORMAL");
      return NONE;
    }
    if (key.ctrl) return NONE;

    const arrow = own(ARROWS, name);
    if (arrow) {
      if (key.shift) {
        const anchor = this.buffer.selection?.start ?? this.cursor;
        this.moveCursor(arrow, "char");
        this.buffer.selection = { start: anchor, end: this.cursor };
      } else {
        this.buffer.selection = null;
        this.moveCursor(arrow, "char");
      }
      return NONE;
    }

    switch (name) {
      case "enter": {
        this.deleteSelection();
        const indent = /^\s*/.exec(this.buffer.lineAt(this.state.cursor.row))?.[0] ?? "";
        this.insertChar("\n" + indent);
        return NONE;
      }
      case "tab":
        this.insertChar(" ".repeat(this.tabWidth));
        return NONE;
      case "backspace":
        if (!this.deleteSelection()) {
          const { row, col } = this.buffer.clamp(this.state.cursor);
          this.setCursor(this.buffer.deleteCharBackward(row, col));
        }
        return NONE;
      case "delete":
        if (!this.deleteSelection()) {
          const { row, col } = this.buffer.clamp(this.state.cursor);
          this.buffer.deleteCharForward(row, col);
        }
        return NONE;
      case "home":
        this.buffer.selection = null;
        this.moveCursor("left", "line");
        return NONE;
      case "end":
        this.buffer.selection = null;
        this.moveCursor("right", "line");
        return NONE;
    }

    const ch = key.ch;
    if (!ch || !isPrintable(ch)) return NONE;

    // Typing a closer that is already under the cursor steps over it.
    if (!this.buffer.selection && CLOSERS.has(ch) && this.charAtCursor() === ch) {
      this.moveCursor("right", "char");
      return NONE;
    }

    const close = own(AUTO_PAIRS, ch);
    if (close) {
      this.insertChar(ch + close);
      this.moveCursor("left", "char");
    } else {
      this.insertChar(ch);
    }
    return NONE;
  }

  private commandKey(key: KeyInput): EditorOutcome {
    switch (key.name) {
      case "escape":
        this.setMode("NORMAL");
        return NONE;
      case "enter": {
        const action = this.applyCommand(parseCommand(this.state.commandLine));
        return { type: "command", action };
      }
      case "backspace": {
        const gs = graphemes(this.state.commandLine);
        this.state.commandLine = gs.slice(0, -1).join("");
        if (!this.state.commandLine) this.setMode("NORMAL");
        return NONE;
      }
    }
    if (key.ch && !key.ctrl && isPrintable(key.ch)) this.state.commandLine += key.ch;
    return NONE;
  }

  // ─── Helpers ────────────────────────────────────────────────────────────

  private deleteSelection(): boolean {
    const sel = this.selection;
    if (!sel) return false;
    this.deleteRange(sel);
    return true;
  }

  private openLine(row: number) {
    this.buffer.insertLine(row, "");
    this.setCursor({ row, col: 0 });
    this.setMode("INSERT");
  }

  private charAtCursor(): string | undefined {
    const { row, col } = this.state.cursor;
    return graphemes(this.buffer.lineAt(row))[col];
  }

  private wordForward(row: number, col: number): Position {
    const gs = graphemes(this.buffer.lineAt(row));
    let c = col;
    while (c < gs.length && !isWhitespace(gs[c])) c++;
    while (c < gs.length && isWhitespace(gs[c])) c++;
    if (c >= gs.length && row < this.buffer.lineCount() - 1) {
      const next = graphemes(this.buffer.lineAt(row + 1));
      let first = 0;
      while (first < next.length && isWhitespace(next[first])) first++;
      return { row: row + 1, col: first };
    }
    return { row, col: c };
  }

  private wordBackward(row: number, col: number): Position {
    let r = row;
    let c = col;
    if (c === 0 && r > 0) {
      r--;
      c = this.buffer.lineLength(r);
    }
    const gs = graphemes(this.buffer.lineAt(r));
    c = Math.max(0, c - 1);
    while (c > 0 && isWhitespace(gs[c])) c--;
    while (c > 0 && !isWhitespace(gs[c - 1])) c--;
    return { row: r, col: c };
  }

  /** The whitespace-delimited word under the cursor; `around` takes adjacent blanks too. */
  private wordRange(row: number, col: number, around: boolean): Range | null {
    const gs = graphemes(this.buffer.lineAt(row));
    if (gs.length === 0 || col >= gs.length) return null;

    // On blanks the "word" is the run of blanks.
    const blank = isWhitespace(gs[col]);
    let start = col;
    let end = col;
    while (start > 0 && isWhitespace(gs[start - 1]) === blank) start--;
    while (end < gs.length && isWhitespace(gs[end]) === blank) end++;

    if (around && !blank) {
      const wordEnd = end;
      while (end < gs.length && isWhitespace(gs[end])) end++;
      if (end === wordEnd) {
        while (start > 0 && isWhitespace(gs[start - 1])) start--;
      }
    }
    return { start: { row, col: start }, end: { row, col: end } };
  }
}

function own<T>(table: Record<string, T>, key: string): T | undefined {
  return Object.hasOwn(table, key) ? table[key] : undefined;
}

function isPrintable(ch: string): boolean {
  return !/[\x00-\x1f\x7f]/.test(ch);
}
