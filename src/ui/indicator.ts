import type { RGB } from "./theme.js";

export const PULSE_PERIOD_MS = 1000;

const SPINNER = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"];
const SPINNER_FRAME_MS = 80;

/** Position within the current pulse, in [0, 1). */
export function pulsePhase(elapsedMs: number): number {
  const t = ((elapsedMs % PULSE_PERIOD_MS) + PULSE_PERIOD_MS) % PULSE_PERIOD_MS;
  return t / PULSE_PERIOD_MS;
}

/** Orange that brightens towards amber and back once per period. */
export function pulseColor(elapsedMs: number): RGB {
  const brightness = (Math.sin(pulsePhase(elapsedMs) * Math.PI * 2) + 1) / 2;
  return [255, Math.round(80 + brightness * 100), Math.round(30 + brightness * 80)];
}

export function spinnerFrame(elapsedMs: number): string {
  const i = Math.floor(Math.max(0, elapsedMs) / SPINNER_FRAME_MS) % SPINNER.length;
  return SPINNER[i];
}

/** Cells of a `width`-cell bar that represent `done` of `total`. */
export function filledCells(done: number, total: number, width: number): number {
  if (total <= 0 || width <= 0) return 0;
  return Math.min(width, Math.round((done / total) * width));
}

export function percent(done: number, total: number): number {
  return total > 0 ? Math.round((done / total) * 100) : 0;
}
