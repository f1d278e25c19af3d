import fs from "node:fs";
import path from "node:path";

import { WatcherError } from "../errors.js";
import type { Logger } from "../log.js";

export type WatchBackend = { close(): void };

/**
 * Starts watching `dir`. `onEvent` receives the file name an event is about,
 * or null when the platform does not say.
 */
export type WatchFactory = (
  dir: string,
  onEvent: (fileName: string | null) => void,
  onError: (err: Error) => void,
) => WatchBackend;

export const nodeWatch: WatchFactory = (dir, onEvent, onError) => {
  const watcher = fs.watch(dir, { persistent: false }, (_event, fileName) => {
    onEvent(fileName ? fileName.toString() : null);
  });
  watcher.on("error", onError);
  return watcher;
};

export type WatcherEvents = {
  changed(filePath: string): void;
  failed(error: WatcherError): void;
};

/**
 * Watches one file at a time. Editors replace files by rename, which drops
 * a watch on the file itself, so the parent directory is watched instead
 * and events are filtered by name. Bursts collapse into a single `changed`
 * once `debounceMs` passes without another event.
 */
export class FileWatcher {
  private target: string | null = null;
  private backend: WatchBackend | null = null;
  private timer: NodeJS.Timeout | null = null;

  constructor(
    private readonly debounceMs: number,
    private readonly events: WatcherEvents,
    private readonly log: Logger,
    private readonly factory: WatchFactory = nodeWatch,
  ) {}

  get watching(): string | null {
    return this.target;
  }

  watch(filePath: string) {
    const target = path.resolve(filePath);
    if (target === this.target) return;
    this.unwatch();

    const dir = path.dirname(target);
    const name = path.basename(target);
    try {
      this.backend = this.factory(
        dir,
        (fileName) => {
          if (fileName === null || fileName === name) this.schedule(target);
        },
        (err) => this.fail(target, err),
      );
    } catch (err) {
      this.fail(target, err);
      return;
    }
    this.target = target;
    this.log.debug("watching", { path: target });
  }

  unwatch() {
    this.clearTimer();
    this.backend?.close();
    this.backend = null;
    if (this.target) this.log.debug("unwatched", { path: this.target });
    this.target = null;
  }

  private schedule(target: string) {
    if (target !== this.target) return;
    this.clearTimer();
    this.timer = setTimeout(() => {
      this.timer = null;
      if (target === this.target) this.events.changed(target);
    }, this.debounceMs);
  }

  private fail(target: string, cause: unknown) {
    const error = new WatcherError(target, cause);
    this.log.warn("watch failed", { path: target, error: error.message });
    this.unwatch();
    this.events.failed(error);
  }

  private clearTimer() {
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
  }
}
