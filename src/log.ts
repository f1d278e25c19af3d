import fs from "node:fs";

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export type LogFields = Record<string, string | number | boolean | null | undefined>;

export type Logger = {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
  child(scope: string): Logger;
};

type Sink = (line: string) => void;

export function formatLogLine(
  at: Date,
  level: LogLevel,
  scope: string | null,
  message: string,
  fields?: LogFields,
): string {
  const parts = [at.toISOString(), level.toUpperCase().padEnd(5)];
  if (scope) parts.push(`[${scope}]`);
  parts.push(message);
  for (const [key, value] of Object.entries(fields ?? {})) {
    if (value === undefined) continue;
    const text = String(value);
    parts.push(`${key}=${/\s/.test(text) ? JSON.stringify(text) : text}`);
  }
  return parts.join(" ");
}

function makeLogger(
  sink: Sink,
  minLevel: LogLevel,
  scope: string | null,
  clock: () => Date,
): Logger {
  const threshold = LOG_LEVELS.indexOf(minLevel);
  const emit = (level: LogLevel, message: string, fields?: LogFields) => {
    if (LOG_LEVELS.indexOf(level) < threshold) return;
    sink(formatLogLine(clock(), level, scope, message, fields));
  };
  return {
    debug: (m, f) => emit("debug", m, f),
    info: (m, f) => emit("info", m, f),
    warn: (m, f) => emit("warn", m, f),
    error: (m, f) => emit("error", m, f),
    child: (child) =>
      makeLogger(sink, minLevel, scope ? `${scope}.${child}` : child, clock),
  };
}

/**
 * Appends one line per entry to `filePath`. The terminal belongs to the UI,
 * so nothing is ever written to stdout/stderr. If the file cannot be opened
 * or written the logger goes quiet and records the failure in `lastError`.
 */
export class FileLog {
  lastError: Error | null = null;
  private stream: fs.WriteStream | null;

  constructor(filePath: string) {
    this.stream = fs.createWriteStream(filePath, { flags: "a" });
    this.stream.on("error", (err) => {
      this.lastError = err;
      this.stream = null;
    });
  }

  logger(level: LogLevel, clock: () => Date = () => new Date()): Logger {
    return makeLogger((line) => this.stream?.write(line + "\n"), level, null, clock);
  }

  close(): Promise<void> {
    const stream = this.stream;
    this.stream = null;
    if (!stream) return Promise.resolve();
    return new Promise((resolve) => stream.end(resolve));
  }
}

/** Collects lines in memory; used by tests and before the log file exists. */
export function memoryLogger(
  lines: string[] = [],
  level: LogLevel = "debug",
  clock: () => Date = () => new Date(0),
): Logger {
  return makeLogger((line) => lines.push(line), level, null, clock);
}

export const silentLogger: Logger = makeLogger(() => {}, "error", null, () => new Date(0));
