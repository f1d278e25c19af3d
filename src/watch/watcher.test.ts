import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { WatcherError } from "../errors.js";
import { memoryLogger } from "../log.js";
import { FileWatcher, type WatchFactory } from "./watcher.js";

type FakeWatch = {
  dir: string;
  emit: (fileName: string | null) => void;
  fail: (err: Error) => void;
  closed: boolean;
};

function fakeFactory() {
  const watches: FakeWatch[] = [];
  const factory: WatchFactory = (dir, onEvent, onError) => {
    const w: FakeWatch = { dir, emit: onEvent, fail: onError, closed: false };
    watches.push(w);
    return {
      close: () => {
        w.closed = true;
      },
    };
  };
  return { factory, watches };
}

function setup() {
  const { factory, watches } = fakeFactory();
  const changed: string[] = [];
  const failures: WatcherError[] = [];
  const lines: string[] = [];
  const watcher = new FileWatcher(
    150,
    { changed: (p) => changed.push(p), failed: (e) => failures.push(e) },
    memoryLogger(lines),
    factory,
  );
  return { watcher, watches, changed, failures, lines };
}

describe("FileWatcher", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });
  afterEach(() => {
    vi.useRealTimers();
  });

  it("collapses a burst of events into one change", () => {
    const { watcher, watches, changed } = setup();
    watcher.watch("/course/src/ex1.ts");
    expect(watches[0].dir).toBe("/course/src");

    watches[0].emit("ex1.ts");
    vi.advanceTimersByTime(100);
    watches[0].emit("ex1.ts");
    vi.advanceTimersByTime(100);
    watches[0].emit("ex1.ts");
    expect(changed).toEqual([]);

    vi.advanceTimersByTime(150);
    expect(changed).toEqual(["/course/src/ex1.ts"]);
  });

  it("ignores other files in the directory", () => {
    const { watcher, watches, changed } = setup();
    watcher.watch("/course/src/ex1.ts");
    watches[0].emit("ex2.ts");
    watches[0].emit(".ex1.ts.swp");
    vi.advanceTimersByTime(500);
    expect(changed).toEqual([]);
  });

  it("counts unnamed events as changes", () => {
    const { watcher, watches, changed } = setup();
    watcher.watch("/course/src/ex1.ts");
    watches[0].emit(null);
    vi.advanceTimersByTime(150);
    expect(changed).toEqual(["/course/src/ex1.ts"]);
  });

  it("replaces the previous watch and drops its pending change", () => {
    const { watcher, watches, changed } = setup();
    watcher.watch("/course/src/ex1.ts");
    watches[0].emit("ex1.ts");
    watcher.watch("/course/src/ex2.ts");

    expect(watches[0].closed).toBe(true);
    expect(watcher.watching).toBe("/course/src/ex2.ts");
    vi.advanceTimersByTime(500);
    expect(changed).toEqual([]);
  });

  it("does not restart a watch on the same file", () => {
    const { watcher, watches } = setup();
    watcher.watch("/course/src/ex1.ts");
    watcher.watch("/course/src/ex1.ts");
    expect(watches).toHaveLength(1);
  });

  it("reports backend errors and stops watching", () => {
    const { watcher, watches, failures, lines } = setup();
    watcher.watch("/course/src/ex1.ts");
    watches[0].fail(new Error("EMFILE"));

    expect(failures).toHaveLength(1);
    expect(failures[0].message).toBe("Stopped watching /course/src/ex1.ts: EMFILE");
    expect(watches[0].closed).toBe(true);
    expect(watcher.watching).toBeNull();
    expect(lines).toContain(
      '1970-01-01T00:00:00.000Z WARN  watch failed path=/course/src/ex1.ts error="Stopped watching /course/src/ex1.ts: EMFILE"',
    );
  });

  it("reports a backend that cannot start", () => {
    const failures: WatcherError[] = [];
    const watcher = new FileWatcher(
      150,
      { changed: () => {}, failed: (e) => failures.push(e) },
      memoryLogger([]),
      () => {
        throw new Error("ENOSPC");
      },
    );
    watcher.watch("/course/src/ex1.ts");
    expect(failures.map((e) => e.message)).toEqual(["Stopped watching /course/src/ex1.ts: ENOSPC"]);
    expect(watcher.watching).toBeNull();
  });
});
