import type { KeyInput } from "../editor/state.js";

/** The fields of a terminal key event the editor cares about. */
export type RawKey = {
  name?: string;
  ctrl?: boolean;
  shift?: boolean;
};

const NAMED = new Set([
  "escape",
  "enter",
  "backspace",
  "delete",
  "tab",
  "up",
  "down",
  "left",
  "right",
  "pageup",
  "pagedown",
  "home",
  "end",
]);

const ALIASES: Record<string, string> = {
  esc: "escape",
};

// The terminal reports a carriage return twice, as "enter" and then as
// "return"; only the first is a key press.
const ECHOES = new Set(["return"]);

/**
 * Named keys keep their name; printable keys are named by the character
 * they produce, so "J" arrives as name "J" rather than "j" with shift.
 */
export function normalizeKey(ch: string | undefined, key: RawKey | undefined): KeyInput | null {
  const ctrl = key?.ctrl ?? false;
  const shift = key?.shift ?? false;
  const raw = key?.name ?? "";
  if (ECHOES.has(raw)) return null;
  const name = Object.hasOwn(ALIASES, raw) ? ALIASES[raw] : raw;

  if (NAMED.has(name)) return { name, ch: null, ctrl, shift };
  if (ctrl) return name ? { name, ch: null, ctrl, shift } : null;
  if (ch && !/[\x00-\x1f\x7f]/.test(ch)) return { name: ch, ch, ctrl: false, shift };
  return name ? { name, ch: null, ctrl, shift } : null;
}
