import { COMMANDS } from "../editor/commands.js";
import type { Editor } from "../editor/editor.js";
import { graphemeCount } from "../editor/grapheme.js";
import type { SessionSnapshot } from "../session/state.js";
import { Canvas, inner, type Rect, type Style, type StyledLine } from "./canvas.js";
import { filledCells, percent, pulseColor, spinnerFrame } from "./indicator.js";
import { centerRect, computeLayout, type Size } from "./layout.js";
import { outputWindow } from "./output.js";
import { ICON, P, TOKEN_COLORS, TONE_COLORS, type Tone } from "./theme.js";

export type Point = { x: number; y: number };

export type Frame = {
  width: number;
  height: number;
  lines: StyledLine[];
  /** Where the terminal cursor goes; null hides it. */
  cursor: Point | null;
};

export const GUTTER_WIDTH = 6;

export const KEY_HINTS = [
  "i: edit",
  ":c check",
  ":h hint",
  "s: solution",
  "[/]: nav",
  ":help",
  "q: quit",
].join(` ${ICON.sep} `);

const HELP_SECTIONS: Array<{ title: string; entries: Array<[string, string]> }> = [
  {
    title: "NAVIGATION",
    entries: [
      ["h j k l  arrows", "move"],
      ["w b", "next / previous word"],
      ["0 $", "line start / end"],
      ["gg G", "first / last line"],
      ["n ]  p [", "next / previous exercise"],
      ["J K", "scroll output"],
      ["PgDn PgUp", "scroll output a page"],
      ["Home End", "output top / bottom"],
      ["Ctrl+O", "expand output"],
    ],
  },
  {
    title: "EDITING",
    entries: [
      ["i a A", "insert / append / at line end"],
      ["o O", "open line below / above"],
      ["x dd r<c>", "delete char / line, replace char"],
      ["diw daw", "delete word"],
      ["ciw caw", "change word"],
      ["yy P", "yank line / paste"],
      ["Shift+arrows", "select (insert mode)"],
      ["Esc", "back to normal mode"],
    ],
  },
  {
    title: "COMMANDS",
    entries: COMMANDS.map((c): [string, string] => [c.names.map((n) => `:${n}`).join(" "), c.help]),
  },
];

export function helpLines(): string[] {
  const lines: string[] = [];
  for (const section of HELP_SECTIONS) {
    if (lines.length) lines.push("");
    lines.push(section.title);
    for (const [keys, what] of section.entries) lines.push(`  ${keys.padEnd(18)}${what}`);
  }
  lines.push("", "Press any key to close");
  return lines;
}

export function renderFrame(snap: SessionSnapshot, size: Size, now: number): Frame {
  const width = Math.max(1, size.width);
  const height = Math.max(3, size.height);
  const layout = computeLayout({ width, height }, snap.paneView);
  const canvas = new Canvas(width, height, { fg: P.text, bg: P.bg });

  drawHeader(canvas, layout.header, snap);

  let cursor: Point | null = null;
  if (layout.editor) {
    cursor = drawCode(canvas, layout.editor, snap.editor, snap.exercise.name, true);
  }
  if (layout.solution && snap.solution) {
    drawCode(canvas, layout.solution, snap.solution, "Solution", false);
  }
  drawOutput(canvas, layout.output, snap, { width, height });
  drawProgress(canvas, layout.progress, snap, now);
  const commandCursor = drawStatus(canvas, layout.status, snap);

  if (snap.helpOpen) {
    drawHelp(canvas, layout.main);
    cursor = null;
  }
  if (commandCursor) cursor = commandCursor;

  return { width, height, lines: canvas.lines(), cursor };
}

function drawHeader(canvas: Canvas, r: Rect, snap: SessionSnapshot) {
  canvas.fill(r, { bg: P.panel });
  let x = canvas.text(r.x, r.y, ` ${ICON.brand} tutor `, { fg: P.primary, bold: true });
  x = canvas.text(x, r.y, ` ${snap.exercise.name}`, { fg: P.text, bold: true });
  if (snap.exerciseDone) x = canvas.text(x, r.y, ` ${ICON.pass}`, { fg: P.success });
  if (snap.editor.dirty) canvas.text(x, r.y, ` ${ICON.modified} modified`, { fg: P.accent });

  const right = `Exercise ${snap.exercise.ordinal + 1}/${snap.total}  ${snap.doneCount} done `;
  canvas.text(r.x + r.width - graphemeCount(right), r.y, right, { fg: P.dim });
}

/**
 * Bordered code pane. The focused pane numbers lines relative to the cursor
 * row (absolute on the cursor row) and reports where the cursor sits.
 */
function drawCode(
  canvas: Canvas,
  rect: Rect,
  editor: Editor,
  title: string,
  focused: boolean,
): Point | null {
  canvas.box(rect, { fg: focused ? P.primary : P.border }, title, { fg: P.text, bold: true });
  const area = inner(rect);
  if (area.width <= 0 || area.height <= 0) return null;

  const top = focused ? editor.state.scrollTop : 0;
  const rows = editor.visibleLines(top, area.height);
  const cur = editor.cursor;
  const sel = focused ? editor.selection : null;
  const gutter = Math.min(GUTTER_WIDTH, area.width);
  const limit = area.x + area.width;

  for (let i = 0; i < area.height; i++) {
    const row = top + i;
    const y = area.y + i;
    const tokens = rows[i];
    if (!tokens) {
      canvas.text(area.x, y, "~", { fg: P.muted });
      continue;
    }

    const onCursor = focused && row === cur.row;
    const num = focused && !onCursor ? Math.abs(row - cur.row) : row + 1;
    canvas.text(
      area.x,
      y,
      String(num).padStart(gutter - 1, " ") + " ",
      { fg: onCursor ? P.accent : P.muted, bold: onCursor },
      gutter,
    );

    const line = editor.buffer.lineAt(row);
    let x = area.x + gutter;
    for (const span of tokens) {
      if (x >= limit) break;
      x = canvas.text(x, y, line.slice(span.start, span.end), { fg: TOKEN_COLORS[span.token] }, limit - x);
    }

    if (sel && row >= sel.start.row && row <= sel.end.row) {
      const from = row === sel.start.row ? sel.start.col : 0;
      // A selection running past the line end covers the line break cell.
      const to = row === sel.end.row ? sel.end.col : graphemeCount(line) + 1;
      const span = Math.min(to, area.width - gutter) - from;
      canvas.paint(area.x + gutter + from, y, Math.max(0, span), { bg: P.selection });
    }
  }

  if (!focused) return null;
  const cy = cur.row - top;
  if (cy < 0 || cy >= area.height) return null;
  return { x: Math.min(area.x + gutter + cur.col, limit - 1), y: area.y + cy };
}

function drawOutput(canvas: Canvas, r: Rect, snap: SessionSnapshot, size: Size) {
  if (r.height < 2) return;
  const { output } = snap;
  const color = TONE_COLORS[output.tone];
  const win = outputWindow(output.lines, size, snap.paneView, snap.outputScroll);

  let title = output.title;
  if (win.total > win.visible) {
    title += ` [${win.offset + 1}-${win.offset + win.rows.length}/${win.total}]`;
  }
  canvas.box(r, { fg: color }, title, { fg: color, bold: true });

  const area = inner(r);
  win.rows.forEach((text, i) => {
    canvas.text(area.x, area.y + i, text, outputLineStyle(text, output.tone), area.width);
  });
}

function outputLineStyle(text: string, tone: Tone): Style {
  if (tone !== "error") return { fg: P.text };
  if (/^\s*error\b/i.test(text)) return { fg: P.error, bold: true };
  if (/^\s*warning\b/i.test(text)) return { fg: P.accent, bold: true };
  if (/^\s*(?:-->|\d*\s*\|)/.test(text)) return { fg: P.info };
  return { fg: P.text };
}

function drawProgress(canvas: Canvas, r: Rect, snap: SessionSnapshot, now: number) {
  const lead =
    snap.running && snap.runStartedAt !== null ? spinnerFrame(now - snap.runStartedAt) : " ";
  let x = canvas.text(r.x, r.y, ` ${lead} `, { fg: P.accent });
  x = canvas.text(x, r.y, "Progress ", { fg: P.dim });

  const { doneCount: done, total } = snap;
  const suffix = ` ${percent(done, total)}% ${done}/${total} `;
  const barWidth = Math.max(0, r.x + r.width - x - graphemeCount(suffix));
  const filled = filledCells(done, total, barWidth);

  canvas.text(x, r.y, ICON.bar.repeat(filled), { fg: P.success });
  canvas.text(x + filled, r.y, ICON.bar.repeat(barWidth - filled), { fg: P.border });
  if (barWidth > 0) {
    canvas.text(x + Math.min(filled, barWidth - 1), r.y, ICON.marker, {
      fg: pulseColor(now - snap.startedAt),
    });
  }
  canvas.text(x + barWidth, r.y, suffix, { fg: P.text, bold: true });
}

const MODE_COLORS = { NORMAL: P.primary, INSERT: P.success, COMMAND: P.info } as const;

/** Returns the cursor position while a command is being typed. */
function drawStatus(canvas: Canvas, r: Rect, snap: SessionSnapshot): Point | null {
  canvas.fill(r, { bg: P.panel });
  const { editor } = snap;
  const mode = editor.mode;
  let x = canvas.text(r.x, r.y, ` ${mode} `, { fg: P.bg, bg: MODE_COLORS[mode], bold: true });
  x += 1;

  if (mode === "COMMAND") {
    const line = ":" + editor.state.commandLine;
    canvas.text(x, r.y, line, { fg: P.text });
    return { x: Math.min(x + graphemeCount(line), r.x + r.width - 1), y: r.y };
  }

  const cur = editor.cursor;
  const flags = [
    snap.watchEnabled ? "watch" : "no-watch",
    snap.autoAdvance ? "auto" : "manual",
    `${cur.row + 1}:${cur.col + 1} `,
  ].join("  ");
  const rightX = r.x + r.width - graphemeCount(flags);
  const room = Math.max(0, rightX - x - 1);

  if (snap.status) {
    canvas.text(x, r.y, snap.status.text, { fg: TONE_COLORS[snap.status.tone] }, room);
  } else {
    const hints = editor.pendingHints();
    const text = hints.length
      ? hints.map((h) => `${h.key}: ${h.title}`).join(` ${ICON.sep} `)
      : KEY_HINTS;
    canvas.text(x, r.y, text, { fg: P.muted }, room);
  }
  canvas.text(rightX, r.y, flags, { fg: P.dim });
  return null;
}

function drawHelp(canvas: Canvas, main: Rect) {
  const lines = helpLines();
  const width = Math.max(...lines.map(graphemeCount)) + 4;
  const r = centerRect(main, width, lines.length + 2);
  canvas.fill(r, { bg: P.panel, fg: P.text });
  canvas.box(r, { fg: P.primary }, "Help", { fg: P.primary, bold: true });

  const area = inner(r);
  lines.slice(0, area.height).forEach((line, i) => {
    const heading = /^[A-Z]+$/.test(line);
    canvas.text(area.x + 1, area.y + i, line, heading ? { fg: P.accent, bold: true } : { fg: P.text }, area.width - 1);
  });
}
