import type { Position } from "./buffer.js";
import type { KeyNode } from "./keymap.js";

export type Mode = "NORMAL" | "INSERT" | "COMMAND";

export type Cursor = Position;

export type Direction = "left" | "right" | "up" | "down";

/** char: one grapheme (one row vertically); word: vim w/b; line: line ends, buffer ends. */
export type Unit = "char" | "word" | "line";

/**
 * One key press, already normalised by the terminal adapter. `name` is
 * either a named key ("escape", "enter", "pageup", ...) or the printable
 * character itself ("J", ":", "a").
 */
export type KeyInput = {
  name: string;
  ch: string | null;
  ctrl: boolean;
  shift: boolean;
};

export type PendingState = {
  node: KeyNode;
  seq: string[]; // e.g. ["d","i"]
};

export type EditorState = {
  mode: Mode;
  cursor: Cursor;
  // Column vertical motions try to return to.
  preferredCol: number;
  scrollTop: number;

  pending: PendingState | null;

  // Command line
  commandLine: string;

  statusMessage: string;
};
