import fs from "node:fs/promises";
import path from "node:path";

import { PersistenceError, describeError, isMissingFile } from "../errors.js";
import type { Logger } from "../log.js";

export type ProgressStatus = "done" | "pending";

export type ProgressRecord = {
  current: string | null;
  statuses: Map<string, ProgressStatus>;
};

const HEADER = [
  "# exercise-tutor progress",
  "# Delete this file to start over.",
];

export function serializeProgress(record: ProgressRecord): string {
  const lines = [...HEADER];
  if (record.current) lines.push(`@current=${record.current}`);
  for (const [id, status] of record.statuses) lines.push(`${id}=${status}`);
  return lines.join("\n") + "\n";
}

/** Lenient: comments, blank, malformed and unknown lines are skipped. */
export function parseProgress(text: string): ProgressRecord {
  const record: ProgressRecord = { current: null, statuses: new Map() };
  for (const raw of text.split(/\r?\n/)) {
    const line = raw.trim();
    if (!line || line.startsWith("#")) continue;

    const eq = line.indexOf("=");
    if (eq <= 0) continue;
    const key = line.slice(0, eq).trim();
    const value = line.slice(eq + 1).trim();

    if (key === "@current") {
      if (value) record.current = value;
    } else if (!key.startsWith("@") && (value === "done" || value === "pending")) {
      record.statuses.set(key, value);
    }
  }
  return record;
}

export class ProgressTracker {
  private currentId: string | null;
  private readonly statuses: Map<string, ProgressStatus>;
  private writing: Promise<PersistenceError | null> = Promise.resolve(null);

  /**
   * `ids` is the curriculum order. Entries for ids outside it are dropped
   * and every id in it gets a status.
   */
  constructor(
    readonly filePath: string,
    private readonly ids: readonly string[],
    private readonly log: Logger,
    loaded: ProgressRecord = { current: null, statuses: new Map() },
  ) {
    this.statuses = new Map(ids.map((id) => [id, loaded.statuses.get(id) ?? "pending"]));
    this.currentId = loaded.current && this.statuses.has(loaded.current) ? loaded.current : null;
  }

  static async load(
    filePath: string,
    ids: readonly string[],
    log: Logger,
  ): Promise<ProgressTracker> {
    let text = "";
    try {
      text = await fs.readFile(filePath, "utf8");
    } catch (err) {
      if (!isMissingFile(err)) {
        log.warn("could not read progress, starting fresh", {
          path: filePath,
          error: describeError(err),
        });
      }
    }
    return new ProgressTracker(filePath, ids, log, parseProgress(text));
  }

  get current(): string | null {
    return this.currentId;
  }

  get total(): number {
    return this.ids.length;
  }

  get doneCount(): number {
    let n = 0;
    for (const s of this.statuses.values()) if (s === "done") n++;
    return n;
  }

  isDone(id: string): boolean {
    return this.statuses.get(id) === "done";
  }

  /** Returns whether anything changed. Unknown ids are ignored. */
  markDone(id: string): boolean {
    return this.set(id, "done");
  }

  markPending(id: string): boolean {
    return this.set(id, "pending");
  }

  setCurrent(id: string): boolean {
    if (!this.statuses.has(id) || this.currentId === id) return false;
    this.currentId = id;
    return true;
  }

  /** Index of the first pending exercise after `from`, wrapping around; `from` itself is skipped. */
  nextPending(from: number): number | null {
    const n = this.ids.length;
    for (let step = 1; step < n; step++) {
      const i = (((from + step) % n) + n) % n;
      if (!this.isDone(this.ids[i])) return i;
    }
    return null;
  }

  snapshot(): ProgressRecord {
    return { current: this.currentId, statuses: new Map(this.statuses) };
  }

  /**
   * Writes the whole record to a sibling temp file and renames it over the
   * record. Writes are queued so a later persist never lands before an
   * earlier one. Failures are logged and returned, never thrown.
   */
  persist(): Promise<PersistenceError | null> {
    const text = serializeProgress(this.snapshot());
    this.writing = this.writing.then(() => this.write(text));
    return this.writing;
  }

  private async write(text: string): Promise<PersistenceError | null> {
    const tmp = path.join(
      path.dirname(this.filePath),
      `.${path.basename(this.filePath)}.${process.pid}.tmp`,
    );
    try {
      await fs.writeFile(tmp, text, "utf8");
      await fs.rename(tmp, this.filePath);
      this.log.debug("progress saved", { path: this.filePath, done: this.doneCount });
      return null;
    } catch (err) {
      const error = new PersistenceError(this.filePath, err);
      this.log.error("progress not saved", { error: error.message });
      await fs.rm(tmp, { force: true }).catch((rmErr: unknown) => {
        this.log.debug("temp file not removed", { path: tmp, error: describeError(rmErr) });
      });
      return error;
    }
  }

  private set(id: string, status: ProgressStatus): boolean {
    const prev = this.statuses.get(id);
    if (prev === undefined || prev === status) return false;
    this.statuses.set(id, status);
    return true;
  }
}
