export type RunResult =
  | { status: "pending" }
  | { status: "success" }
  | { status: "failure"; lines: string[] }
  | { status: "tool-error"; message: string };

export const PENDING: RunResult = { status: "pending" };
