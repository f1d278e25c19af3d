import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { PersistenceError } from "../errors.js";
import { memoryLogger, silentLogger } from "../log.js";
import { ProgressTracker, parseProgress, serializeProgress } from "./tracker.js";

const IDS = ["intro1", "vars1", "vars2", "funcs1"];

let dir: string;

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), "tutor-progress-"));
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

describe("progress record text", () => {
  it("writes comments, the current id and one line per exercise", () => {
    const text = serializeProgress({
      current: "vars1",
      statuses: new Map([
        ["intro1", "done"],
        ["vars1", "pending"],
      ]),
    });
    expect(text).toBe(
      [
        "# exercise-tutor progress",
        "# Delete this file to start over.",
        "@current=vars1",
        "intro1=done",
        "vars1=pending",
        "",
      ].join("\n"),
    );
  });

  it("skips malformed lines", () => {
    const record = parseProgress(
      "# note\r\n@current=vars2\ngarbage\n=done\nintro1 = done\nvars1=maybe\n@other=x\n",
    );
    expect(record.current).toBe("vars2");
    expect([...record.statuses]).toEqual([["intro1", "done"]]);
  });
});

describe("ProgressTracker", () => {
  it("starts with everything pending when no record exists", async () => {
    const t = await ProgressTracker.load(path.join(dir, "progress"), IDS, silentLogger);
    expect(t.doneCount).toBe(0);
    expect(t.current).toBeNull();
    expect(t.total).toBe(4);
  });

  it("reproduces the record after persist and load", async () => {
    const file = path.join(dir, "progress");
    const t = await ProgressTracker.load(file, IDS, silentLogger);
    t.markDone("intro1");
    t.markDone("vars2");
    t.setCurrent("vars1");
    await expect(t.persist()).resolves.toBeNull();

    const again = await ProgressTracker.load(file, IDS, silentLogger);
    expect(again.snapshot()).toEqual(t.snapshot());
    expect(again.isDone("vars2")).toBe(true);
    expect(again.current).toBe("vars1");
    expect(await fs.readdir(dir)).toEqual(["progress"]);
  });

  it("marks done idempotently", () => {
    const t = new ProgressTracker("unused", IDS, silentLogger);
    expect(t.markDone("vars1")).toBe(true);
    expect(t.markDone("vars1")).toBe(false);
    expect(t.doneCount).toBe(1);
    expect(t.markPending("vars1")).toBe(true);
    expect(t.doneCount).toBe(0);
  });

  it("ignores ids outside the curriculum", () => {
    const t = new ProgressTracker("unused", IDS, silentLogger, {
      current: "gone",
      statuses: new Map([["gone", "done"]]),
    });
    expect(t.current).toBeNull();
    expect(t.markDone("gone")).toBe(false);
    expect(t.setCurrent("gone")).toBe(false);
    expect([...t.snapshot().statuses.keys()]).toEqual(IDS);
  });

  it("finds the next pending exercise, wrapping past the end", () => {
    const t = new ProgressTracker("unused", IDS, silentLogger);
    t.markDone("intro1");
    t.markDone("funcs1");
    expect(t.nextPending(0)).toBe(1);
    expect(t.nextPending(1)).toBe(2);
    expect(t.nextPending(2)).toBe(1);
    t.markDone("vars1");
    expect(t.nextPending(2)).toBeNull();
  });

  it("returns a PersistenceError when the record cannot be written", async () => {
    const file = path.join(dir, "missing", "progress");
    const lines: string[] = [];
    const t = new ProgressTracker(file, IDS, memoryLogger(lines));
    t.markDone("intro1");

    const err = await t.persist();
    expect(err).toBeInstanceOf(PersistenceError);
    expect(err?.path).toBe(file);
    expect(t.isDone("intro1")).toBe(true);
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/ERROR progress not saved error="Could not write /);

    await fs.mkdir(path.join(dir, "missing"));
    await expect(t.persist()).resolves.toBeNull();
    expect(await fs.readFile(file, "utf8")).toContain("intro1=done\n");
  });

  it("applies queued writes in order", async () => {
    const file = path.join(dir, "progress");
    const t = new ProgressTracker(file, IDS, silentLogger);
    t.markDone("intro1");
    const first = t.persist();
    t.markPending("intro1");
    const second = t.persist();
    await Promise.all([first, second]);

    expect(await fs.readFile(file, "utf8")).toContain("intro1=pending\n");
  });
});
