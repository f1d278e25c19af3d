import type { Language } from "./language.js";

export type TokenClass =
  | "plain"
  | "keyword"
  | "type"
  | "string"
  | "comment"
  | "number"
  | "punctuation"
  | "operator";

/** `start`/`end` are string indices into the line, end exclusive. */
export type HighlightSpan = { start: number; end: number; token: TokenClass };

/** What is still open at a line boundary. */
export type LineState =
  | { kind: "default" }
  | { kind: "string"; delimiter: string }
  | { kind: "comment"; depth: number };

export const DEFAULT_STATE: LineState = { kind: "default" };

export function sameState(a: LineState, b: LineState): boolean {
  if (a.kind === "string" && b.kind === "string") return a.delimiter === b.delimiter;
  if (a.kind === "comment" && b.kind === "comment") return a.depth === b.depth;
  return a.kind === b.kind;
}

const WORD_START = /[\p{L}_]/u;
const WORD_CHAR = /[\p{L}\p{N}_]/u;
const NUMBER_CHAR = /[0-9A-Za-z_.]/;

/**
 * Spans for one line plus the state it leaves open. Iterating is lazy and
 * can be repeated; each pass rescans the line from `entry`.
 */
export class LineTokens implements Iterable<HighlightSpan> {
  private exit: LineState | null = null;

  constructor(
    readonly line: string,
    readonly entry: LineState,
    private readonly language: Language,
  ) {}

  [Symbol.iterator](): Iterator<HighlightSpan> {
    return mergeAdjacent(scanLine(this.line, this.entry, this.language));
  }

  get endState(): LineState {
    if (!this.exit) {
      const scan = scanLine(this.line, this.entry, this.language);
      let step = scan.next();
      while (!step.done) step = scan.next();
      this.exit = step.value;
    }
    return this.exit;
  }
}

export function highlightLine(line: string, entry: LineState, language: Language): LineTokens {
  return new LineTokens(line, entry, language);
}

function* mergeAdjacent(spans: Iterable<HighlightSpan>): Generator<HighlightSpan, void> {
  let pending: HighlightSpan | null = null;
  for (const span of spans) {
    if (span.end <= span.start) continue;
    if (pending && pending.token === span.token && pending.end === span.start) {
      pending = { start: pending.start, end: span.end, token: pending.token };
      continue;
    }
    if (pending) yield pending;
    pending = span;
  }
  if (pending) yield pending;
}

export function* scanLine(
  line: string,
  entry: LineState,
  lang: Language,
): Generator<HighlightSpan, LineState> {
  let state = entry;
  let i = 0;

  while (i < line.length) {
    if (state.kind === "comment") {
      const { end, depth } = scanBlockComment(line, i, state.depth, lang);
      yield { start: i, end, token: "comment" };
      i = end;
      state = depth === 0 ? DEFAULT_STATE : { kind: "comment", depth };
      continue;
    }

    if (state.kind === "string") {
      const { end, closed } = scanString(line, i, state.delimiter, lang.escape);
      yield { start: i, end, token: "string" };
      i = end;
      if (closed) state = DEFAULT_STATE;
      continue;
    }

    if (lang.lineComment.some((m) => line.startsWith(m, i))) {
      yield { start: i, end: line.length, token: "comment" };
      i = line.length;
      break;
    }

    const block = lang.blockComment;
    if (block && line.startsWith(block.open, i)) {
      const { end, depth } = scanBlockComment(line, i + block.open.length, 1, lang);
      yield { start: i, end, token: "comment" };
      i = end;
      state = depth === 0 ? DEFAULT_STATE : { kind: "comment", depth };
      continue;
    }

    const delimiter = lang.strings.find((d) => line.startsWith(d, i));
    if (delimiter) {
      const { end, closed } = scanString(line, i + delimiter.length, delimiter, lang.escape);
      yield { start: i, end, token: "string" };
      i = end;
      state = closed ? DEFAULT_STATE : { kind: "string", delimiter };
      continue;
    }

    const ch = line.charAt(i);

    if (/\s/.test(ch)) {
      const end = runWhile(line, i, (c) => /\s/.test(c));
      yield { start: i, end, token: "plain" };
      i = end;
      continue;
    }

    if (/[0-9]/.test(ch)) {
      const end = runWhile(line, i, (c, at) =>
        // `0..10` is a range, not a float
        NUMBER_CHAR.test(c) && !(c === "." && line.charAt(at + 1) === "."),
      );
      yield { start: i, end, token: "number" };
      i = end;
      continue;
    }

    if (WORD_START.test(ch)) {
      const end = runWhile(line, i, (c) => WORD_CHAR.test(c));
      yield { start: i, end, token: classifyWord(line.slice(i, end), lang) };
      i = end;
      continue;
    }

    if (lang.operators.has(ch)) {
      const end = runWhile(line, i, (c) => lang.operators.has(c));
      yield { start: i, end, token: "operator" };
      i = end;
      continue;
    }

    // Surrogate pairs stay together.
    const width = /[\uD800-\uDBFF]/.test(ch) ? 2 : 1;
    yield {
      start: i,
      end: i + width,
      token: lang.punctuation.has(ch) ? "punctuation" : "plain",
    };
    i += width;
  }

  return state;
}

function classifyWord(word: string, lang: Language): TokenClass {
  if (lang.keywords.has(word)) return "keyword";
  if (lang.types.has(word)) return "type";
  if (/^\p{Lu}/u.test(word) && lang.keywords.size > 0) return "type";
  return "plain";
}

function runWhile(line: string, from: number, ok: (c: string, at: number) => boolean): number {
  let i = from;
  while (i < line.length && ok(line.charAt(i), i)) i++;
  return i;
}

function scanString(
  line: string,
  from: number,
  delimiter: string,
  escape: string | null,
): { end: number; closed: boolean } {
  let i = from;
  while (i < line.length) {
    if (escape !== null && line.charAt(i) === escape) {
      i += 2;
      continue;
    }
    if (line.startsWith(delimiter, i)) return { end: i + delimiter.length, closed: true };
    i++;
  }
  return { end: line.length, closed: false };
}

function scanBlockComment(
  line: string,
  from: number,
  depth: number,
  lang: Language,
): { end: number; depth: number } {
  const block = lang.blockComment;
  if (!block) return { end: line.length, depth: 0 };
  let i = from;
  let d = depth;
  while (i < line.length) {
    if (block.nested && line.startsWith(block.open, i)) {
      d++;
      i += block.open.length;
      continue;
    }
    if (line.startsWith(block.close, i)) {
      d--;
      i += block.close.length;
      if (d === 0) return { end: i, depth: 0 };
      continue;
    }
    i++;
  }
  return { end: line.length, depth: d };
}
