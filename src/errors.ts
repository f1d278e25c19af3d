export type ErrorKind =
  | "user-input"
  | "tool-invocation"
  | "watcher"
  | "persistence"
  | "config";

export abstract class TutorError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Unrecognised command text. Shown in the status line, never fatal. */
export class UserInputError extends TutorError {
  readonly kind = "user-input";

  constructor(readonly input: string, readonly suggestion: string | null) {
    super(
      suggestion
        ? `Unknown command: ${input} (did you mean :${suggestion}?)`
        : `Unknown command: ${input} (try :help)`,
    );
  }
}

export class ToolInvocationError extends TutorError {
  readonly kind = "tool-invocation";
}

export class WatcherError extends TutorError {
  readonly kind = "watcher";

  constructor(readonly path: string, cause: unknown) {
    super(`Stopped watching ${path}: ${describeError(cause)}`, { cause });
  }
}

export class PersistenceError extends TutorError {
  readonly kind = "persistence";

  constructor(readonly path: string, cause: unknown) {
    super(`Could not write ${path}: ${describeError(cause)}`, { cause });
  }
}

export class ConfigError extends TutorError {
  readonly kind = "config";
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
