import { spawn, type SpawnOptions } from "node:child_process";
import type { Readable } from "node:stream";

import { ToolInvocationError, describeError } from "../errors.js";
import type { ExerciseDescriptor, RunMode } from "../exercises/types.js";
import type { Logger } from "../log.js";
import { classifyExit, toolError } from "./classify.js";
import { OutputCollector } from "./output.js";
import type { RunResult } from "./types.js";

/** The part of a ChildProcess the runner relies on. */
export type ChildHandle = {
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  kill(signal?: NodeJS.Signals): boolean;
  on(event: "error", listener: (err: Error) => void): unknown;
  on(
    event: "close",
    listener: (code: number | null, signal: NodeJS.Signals | null) => void,
  ): unknown;
};

export type SpawnFn = (
  command: string,
  args: readonly string[],
  options: SpawnOptions,
) => ChildHandle;

export type RunnerOptions = {
  command: string;
  args: readonly string[];
  timeoutMs: number;
  successPattern: RegExp;
  maxOutputBytes: number;
  /** Time between SIGTERM and SIGKILL once a run is abandoned. */
  killGraceMs?: number;
};

export type RunHandle = {
  readonly exerciseId: string;
  readonly result: Promise<RunResult>;
  cancel(): void;
};

type ActiveRun = {
  cancelled: boolean;
  child: ChildHandle | null;
};

/**
 * Invokes `<command> [...args] <mode> <path>` for an exercise. At most one
 * run per exercise is in flight: starting another cancels the previous one.
 */
export class ExerciseRunner {
  private readonly active = new Map<string, ActiveRun>();

  constructor(
    private readonly options: RunnerOptions,
    private readonly log: Logger,
    private readonly spawnFn: SpawnFn = spawn,
  ) {}

  run(exercise: ExerciseDescriptor, mode: RunMode): RunHandle {
    return this.start(exercise, [mode]);
  }

  /** Every mode the exercise requires, in order, stopping at the first non-success. */
  runExercise(exercise: ExerciseDescriptor): RunHandle {
    return this.start(exercise, exercise.modes);
  }

  cancel(exerciseId: string): boolean {
    const run = this.active.get(exerciseId);
    if (!run) return false;
    this.abort(run);
    this.active.delete(exerciseId);
    return true;
  }

  cancelAll() {
    for (const id of [...this.active.keys()]) this.cancel(id);
  }

  private start(exercise: ExerciseDescriptor, modes: readonly RunMode[]): RunHandle {
    this.cancel(exercise.id);
    const run: ActiveRun = { cancelled: false, child: null };
    this.active.set(exercise.id, run);
    return {
      exerciseId: exercise.id,
      result: this.execute(run, exercise, modes),
      cancel: () => {
        if (this.active.get(exercise.id) === run) this.cancel(exercise.id);
        else this.abort(run);
      },
    };
  }

  private abort(run: ActiveRun) {
    run.cancelled = true;
    run.child?.kill("SIGTERM");
  }

  private async execute(
    run: ActiveRun,
    exercise: ExerciseDescriptor,
    modes: readonly RunMode[],
  ): Promise<RunResult> {
    try {
      for (const mode of modes) {
        if (run.cancelled) return toolError("Run cancelled");
        const result = await this.invoke(run, exercise, mode);
        this.log.info("run finished", {
          exercise: exercise.id,
          mode,
          status: result.status,
        });
        if (result.status === "tool-error") {
          const err = new ToolInvocationError(result.message);
          this.log.warn(err.message, { exercise: exercise.id, mode, kind: err.kind });
        }
        if (result.status !== "success") return result;
      }
      return { status: "success" };
    } finally {
      if (this.active.get(exercise.id) === run) this.active.delete(exercise.id);
    }
  }

  private invoke(run: ActiveRun, exercise: ExerciseDescriptor, mode: RunMode): Promise<RunResult> {
    const { command, timeoutMs, successPattern, maxOutputBytes } = this.options;
    const killGraceMs = this.options.killGraceMs ?? 2000;
    const args = [...this.options.args, mode, exercise.path];
    this.log.debug("spawn", { command, args: args.join(" "), cwd: exercise.cwd });

    return new Promise<RunResult>((resolve) => {
      let child: ChildHandle;
      try {
        child = this.spawnFn(command, args, {
          cwd: exercise.cwd,
          stdio: ["ignore", "pipe", "pipe"],
        });
      } catch (err) {
        resolve(toolError(`Could not start ${command}: ${describeError(err)}`));
        return;
      }

      const output = new OutputCollector(maxOutputBytes);
      let timedOut = false;
      let settled = false;
      let killTimer: NodeJS.Timeout | null = null;

      const finish = (result: RunResult) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        if (killTimer) clearTimeout(killTimer);
        run.child = null;
        resolve(result);
      };

      const timer = setTimeout(() => {
        timedOut = true;
        this.log.warn("run timed out", { exercise: exercise.id, mode, timeoutMs });
        child.kill("SIGTERM");
        killTimer = setTimeout(() => {
          child.kill("SIGKILL");
          finish(toolError(`Toolchain timed out after ${timeoutMs}ms`));
        }, killGraceMs);
      }, timeoutMs);

      run.child = child;
      child.stdout?.on("data", (chunk: Buffer | string) => output.push(chunk));
      child.stderr?.on("data", (chunk: Buffer | string) => output.push(chunk));
      child.on("error", (err) => {
        this.log.error("spawn failed", { command, error: err.message });
        finish(toolError(`Could not start ${command}: ${err.message}`));
      });
      child.on("close", (code, signal) => {
        finish(
          classifyExit(
            {
              code,
              signal,
              output: output.text(),
              truncated: output.truncated,
              timedOut,
              cancelled: run.cancelled,
              timeoutMs,
            },
            successPattern,
          ),
        );
      });
    });
  }
}

