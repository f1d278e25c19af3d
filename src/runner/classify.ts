import { toLines } from "./output.js";
import type { RunResult } from "./types.js";

export type ExitInfo = {
  code: number | null;
  signal: NodeJS.Signals | null;
  output: string;
  truncated: boolean;
  timedOut: boolean;
  cancelled: boolean;
  timeoutMs: number;
};

export const TRUNCATED_NOTE = "… output truncated";

/**
 * Exit 0 with the success marker is a pass; a non-zero exit that printed
 * diagnostics is a failure; everything else means the toolchain itself
 * misbehaved.
 */
export function classifyExit(info: ExitInfo, successPattern: RegExp): RunResult {
  if (info.cancelled) return toolError("Run cancelled");
  if (info.timedOut) return toolError(`Toolchain timed out after ${info.timeoutMs}ms`);
  if (info.signal) return toolError(`Toolchain was terminated by ${info.signal}`);

  const lines = toLines(info.output);

  if (info.code === 0) {
    if (lines.some((l) => successPattern.test(l))) return { status: "success" };
    return toolError("Toolchain exited 0 without reporting success");
  }

  if (lines.length === 0) {
    return toolError(`Toolchain exited with code ${info.code ?? "?"} and printed nothing`);
  }
  return {
    status: "failure",
    lines: info.truncated ? [...lines, TRUNCATED_NOTE] : lines,
  };
}

export function toolError(message: string): RunResult {
  return { status: "tool-error", message };
}

/** The marker is tested against each output line, ignoring case. */
export function successMatcher(pattern: string): RegExp {
  return new RegExp(pattern, "i");
}
