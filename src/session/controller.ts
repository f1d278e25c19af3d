import fs from "node:fs/promises";

import type { CommandAction } from "../editor/commands.js";
import { Editor, type SessionIntent } from "../editor/editor.js";
import type { KeyInput } from "../editor/state.js";
import { UserInputError, describeError, isMissingFile, type WatcherError } from "../errors.js";
import type { ExerciseDescriptor, ExerciseSource } from "../exercises/types.js";
import { languageFor, type Language } from "../highlight/language.js";
import type { Logger } from "../log.js";
import type { ProgressTracker } from "../progress/tracker.js";
import { toolError } from "../runner/classify.js";
import type { RunHandle } from "../runner/runner.js";
import { PENDING, type RunResult } from "../runner/types.js";
import { inner } from "../ui/canvas.js";
import { computeLayout, type PaneView, type Size } from "../ui/layout.js";
import { maxOutputScroll } from "../ui/output.js";
import { ICON, type Tone } from "../ui/theme.js";
import type {
  OutputPanel,
  SessionEvent,
  SessionSnapshot,
  SessionState,
} from "./state.js";

export type RunnerPort = {
  runExercise(exercise: ExerciseDescriptor): RunHandle;
  cancel(exerciseId: string): boolean;
  cancelAll(): void;
};

export type WatcherPort = {
  watch(filePath: string): void;
  unwatch(): void;
};

export type FileStore = {
  read(filePath: string): Promise<string>;
  write(filePath: string, text: string): Promise<void>;
};

export const nodeFiles: FileStore = {
  read: (p) => fs.readFile(p, "utf8"),
  write: (p, text) => fs.writeFile(p, text, "utf8"),
};

export type SessionSettings = {
  autoAdvance: boolean;
  watch: boolean;
  runOnChange: boolean;
  runOnSave: boolean;
  tabWidth: number;
};

export type SessionDeps = {
  source: ExerciseSource;
  runner: RunnerPort;
  watcher: WatcherPort;
  progress: ProgressTracker;
  languages: readonly Language[];
  settings: SessionSettings;
  /** Feeds run completions back into the event channel. */
  emit: (event: SessionEvent) => void;
  log: Logger;
  files?: FileStore;
  clock?: () => number;
  viewport?: Size;
};

const DEFAULT_VIEWPORT: Size = { width: 80, height: 24 };

/**
 * Owns the session state. Events are handled one at a time; nothing else
 * writes to the state.
 */
export class SessionController {
  private readonly state: SessionState;
  private readonly files: FileStore;
  private readonly clock: () => number;
  private readonly log: Logger;
  // Active file text as of our last write or reload. The watcher reports
  // our own writes too.
  private lastSynced: string | null = null;

  constructor(private readonly deps: SessionDeps) {
    const { source, progress, settings } = deps;
    if (source.exercises.length === 0) throw new RangeError("course has no exercises");

    this.files = deps.files ?? nodeFiles;
    this.clock = deps.clock ?? (() => Date.now());
    this.log = deps.log.child("session");

    const index = initialIndex(source.exercises, progress);
    const exercise = source.exercises[index];
    this.state = {
      index,
      exercise,
      editor: this.newEditor(exercise),
      solution: null,
      result: null,
      generation: 0,
      runStartedAt: null,
      checkingAll: false,
      output: intro(exercise, false),
      outputScroll: 0,
      view: "editor",
      underHelp: "editor",
      watchEnabled: settings.watch,
      autoAdvance: settings.autoAdvance,
      status: null,
      viewport: deps.viewport ?? DEFAULT_VIEWPORT,
      startedAt: this.clock(),
      quitting: false,
    };
  }

  /** Loads the exercise the user left off at. */
  async start(): Promise<void> {
    await this.enter(this.state.index);
    if (this.allDone()) this.state.output = this.finalPanel();
  }

  get finished(): boolean {
    return this.state.quitting;
  }

  async handle(event: SessionEvent): Promise<void> {
    switch (event.type) {
      case "key":
        return this.onKey(event.key);
      case "file-changed":
        return this.onFileChanged(event.path);
      case "run-finished":
        return this.onRunFinished(event.exerciseId, event.generation, event.result);
      case "check-all-finished":
        return this.onCheckAllFinished(event.generation, event.failed);
      case "watch-error":
        return this.onWatchError(event.error);
      case "resize":
        this.state.viewport = event.size;
        this.state.editor.scrollToCursor(this.editorRows());
        this.clampOutputScroll();
        return;
    }
  }

  /** Shown in the status row; used for failures that reach the event loop. */
  report(err: unknown) {
    this.notify(describeError(err), "error");
  }

  async shutdown(): Promise<void> {
    this.deps.runner.cancelAll();
    this.deps.watcher.unwatch();
    await this.persist();
    this.log.info("session ended", { done: this.deps.progress.doneCount });
  }

  snapshot(): SessionSnapshot {
    const s = this.state;
    const { progress, source } = this.deps;
    const editorStatus = s.editor.state.statusMessage;
    return {
      exercise: s.exercise,
      total: source.exercises.length,
      doneCount: progress.doneCount,
      exerciseDone: progress.isDone(s.exercise.id),
      editor: s.editor,
      solution: s.view === "solution" || s.underHelp === "solution" ? s.solution : null,
      paneView: this.paneView(),
      helpOpen: s.view === "help",
      output: s.output,
      outputScroll: s.outputScroll,
      running: s.result?.status === "pending",
      runStartedAt: s.runStartedAt,
      startedAt: s.startedAt,
      status: s.status ?? (editorStatus ? { text: editorStatus, tone: "warning" } : null),
      watchEnabled: s.watchEnabled,
      autoAdvance: s.autoAdvance,
    };
  }

  // ─── Keys ───────────────────────────────────────────────────────────────

  private async onKey(key: KeyInput) {
    const s = this.state;
    if (s.view === "help") {
      s.view = s.underHelp;
      return;
    }

    s.status = null;
    s.editor.state.statusMessage = "";
    const outcome = s.editor.handleKey(key);
    s.editor.scrollToCursor(this.editorRows());

    if (outcome.type === "command") await this.onAction(outcome.action);
    else if (outcome.type === "intent") await this.onIntent(outcome.intent);
  }

  private async onAction(action: CommandAction) {
    const s = this.state;
    switch (action.type) {
      case "save":
        if (await this.save()) {
          this.notify(`Saved ${s.exercise.name}`, "info");
          if (this.deps.settings.runOnSave) this.startRun();
        }
        return;
      case "check":
        if (await this.save()) this.startRun();
        return;
      case "next":
        return this.go(s.index + 1);
      case "previous":
        return this.go(s.index - 1);
      case "toggle-solution":
        return this.toggleSolution();
      case "toggle-auto-advance":
        s.autoAdvance = !s.autoAdvance;
        this.notify(`Auto-advance ${s.autoAdvance ? "on" : "off"}`, "info");
        return;
      case "toggle-watch":
        this.setWatching(!s.watchEnabled);
        return;
      case "reload":
        return this.reload();
      case "reset":
        return this.reset();
      case "show-hint":
        this.showHint();
        return;
      case "help":
        s.underHelp = this.paneView();
        s.view = "help";
        return;
      case "quit":
        if (!action.force && s.editor.dirty) {
          this.notify("Unsaved changes! Use :q! to discard them or :wq to save", "warning");
          return;
        }
        s.quitting = true;
        return;
      case "save-and-quit":
        if (await this.save()) s.quitting = true;
        return;
      case "unknown":
        this.notify(new UserInputError(action.input, action.suggestion).message, "error");
        return;
    }
  }

  private async onIntent(intent: SessionIntent) {
    const s = this.state;
    switch (intent.type) {
      case "toggle-solution":
      case "next":
      case "previous":
        return this.onAction({ type: intent.type });
      case "quit":
        return this.onAction({ type: "quit", force: false });
      case "scroll-output":
        s.outputScroll += intent.delta;
        this.clampOutputScroll();
        return;
      case "output-top":
        s.outputScroll = 0;
        return;
      case "output-bottom":
        s.outputScroll = this.maxScroll();
        return;
      case "toggle-expanded-output":
        s.view = this.paneView() === "expanded-output" ? "editor" : "expanded-output";
        this.clampOutputScroll();
        return;
    }
  }

  // ─── Runs ───────────────────────────────────────────────────────────────

  private startRun() {
    const s = this.state;
    if (s.checkingAll) this.cancelRuns();
    const generation = ++s.generation;
    const exercise = s.exercise;
    s.result = PENDING;
    s.runStartedAt = this.clock();
    s.output = {
      title: "Output",
      lines: [`${ICON.run} Checking ${exercise.name}…`],
      tone: "info",
    };
    s.outputScroll = 0;
    this.log.debug("run started", { exercise: exercise.id, generation });

    const finished = (result: RunResult) =>
      this.deps.emit({ type: "run-finished", exerciseId: exercise.id, generation, result });
    this.deps.runner
      .runExercise(exercise)
      .result.then(finished, (err: unknown) => finished(toolError(describeError(err))));
  }

  private async onRunFinished(exerciseId: string, generation: number, result: RunResult) {
    const s = this.state;
    if (generation !== s.generation || exerciseId !== s.exercise.id) {
      this.log.debug("stale result discarded", { exercise: exerciseId, generation });
      return;
    }
    s.result = result;
    s.runStartedAt = null;
    s.outputScroll = 0;

    switch (result.status) {
      case "success":
        return this.onPassed();
      case "failure":
        s.output = { title: `${ICON.fail} Errors`, lines: result.lines, tone: "error" };
        return;
      case "tool-error":
        s.output = { title: "Toolchain", lines: [result.message], tone: "warning" };
        return;
      case "pending":
        return;
    }
  }

  private async onPassed() {
    const s = this.state;
    const { progress } = this.deps;
    const passed = s.exercise;
    progress.markDone(passed.id);
    this.notify(`${ICON.pass} ${passed.name} passed`, "success");

    const next = progress.nextPending(s.index);
    if (next === null) {
      await this.persist();
      this.startFinalCheck(passed);
      return;
    }
    if (s.autoAdvance) {
      await this.enter(next);
      s.output = {
        title: "Output",
        lines: [`${ICON.pass} ${passed.name} passed.`, `Moved on to ${s.exercise.name}.`],
        tone: "success",
      };
      return;
    }
    await this.persist();
    s.output = {
      title: "Output",
      lines: [
        `${ICON.pass} ${passed.name} passed.`,
        "Press n for the next exercise, or :auto to move on automatically.",
      ],
      tone: "success",
    };
  }

  /** Re-runs the whole course; the final message waits for every exercise to pass. */
  private startFinalCheck(passed: ExerciseDescriptor) {
    const s = this.state;
    const { exercises } = this.deps.source;
    const generation = ++s.generation;
    s.result = PENDING;
    s.runStartedAt = this.clock();
    s.checkingAll = true;
    s.output = {
      title: "Output",
      lines: [`${ICON.pass} ${passed.name} passed.`, `${ICON.run} Checking every exercise once more…`],
      tone: "info",
    };
    s.outputScroll = 0;
    this.log.info("final check started", { count: exercises.length, generation });

    const passes = exercises.map((exercise) =>
      this.deps.runner.runExercise(exercise).result.then(
        (result) => result.status === "success",
        (err: unknown) => {
          this.log.warn("final check run failed", { exercise: exercise.id, error: describeError(err) });
          return false;
        },
      ),
    );
    Promise.all(passes).then(
      (ok) => {
        const failed = exercises.filter((_, i) => !ok[i]).map((e) => e.id);
        this.deps.emit({ type: "check-all-finished", generation, failed });
      },
      (err: unknown) => this.log.error("final check failed", { error: describeError(err) }),
    );
  }

  private async onCheckAllFinished(generation: number, failed: string[]) {
    const s = this.state;
    if (generation !== s.generation) {
      this.log.debug("stale final check discarded", { generation });
      return;
    }
    s.checkingAll = false;
    s.result = null;
    s.runStartedAt = null;
    s.outputScroll = 0;

    if (failed.length === 0) {
      this.log.info("course complete");
      s.output = this.finalPanel();
      return;
    }

    const { progress, source } = this.deps;
    for (const id of failed) progress.markPending(id);
    const first = source.exercises.findIndex((e) => failed.includes(e.id));
    await this.enter(first);
    await this.persist();
    const names = source.exercises.filter((e) => failed.includes(e.id)).map((e) => e.name);
    s.output = {
      title: `${ICON.fail} Not done yet`,
      lines: [`These exercises no longer pass: ${names.join(", ")}`],
      tone: "warning",
    };
    this.notify(`${names.length} of ${source.exercises.length} exercises need another look`, "warning");
  }

  // ─── Exercises ──────────────────────────────────────────────────────────

  private async go(index: number) {
    const count = this.deps.source.exercises.length;
    if (index < 0) return this.notify("Already at the first exercise", "info");
    if (index >= count) return this.notify("Already at the last exercise", "info");
    await this.enter(index);
  }

  /** Switch to `index`, replacing buffer and descriptor together. */
  private async enter(index: number) {
    const s = this.state;
    this.cancelRuns();

    const exercise = this.deps.source.exercises[index];
    const editor = this.newEditor(exercise);
    editor.load((await this.readWorkingCopy(exercise)) ?? "");

    s.index = index;
    s.exercise = exercise;
    s.editor = editor;
    this.lastSynced = null;
    s.solution = null;
    s.result = null;
    s.runStartedAt = null;
    s.output = intro(exercise, this.deps.progress.isDone(exercise.id));
    s.outputScroll = 0;
    s.view = "editor";
    s.underHelp = "editor";

    if (s.watchEnabled) this.deps.watcher.watch(exercise.path);
    if (this.deps.progress.setCurrent(exercise.id)) await this.persist();
    this.log.info("exercise opened", { exercise: exercise.id, index });
  }

  private async reload() {
    const s = this.state;
    const text = await this.readWorkingCopy(s.exercise);
    if (text === null) return;
    s.editor.load(text);
    this.notify(`Reloaded ${s.exercise.name}`, "info");
  }

  private async reset() {
    const s = this.state;
    const exercise = s.exercise;
    let original: string;
    try {
      original = await this.deps.source.originalText(exercise.id);
      await this.files.write(exercise.path, original);
    } catch (err) {
      this.log.error("reset failed", { exercise: exercise.id, error: describeError(err) });
      this.notify(`Could not reset ${exercise.name}: ${describeError(err)}`, "error");
      return;
    }

    this.cancelRuns();
    this.lastSynced = original;
    s.editor.load(original);
    s.result = null;
    s.runStartedAt = null;
    s.output = intro(exercise, false);
    s.outputScroll = 0;
    if (this.deps.progress.markPending(exercise.id)) await this.persist();
    this.notify(`Reset ${exercise.name} to its original state`, "info");
  }

  private async toggleSolution() {
    const s = this.state;
    if (this.paneView() === "solution") {
      s.view = "editor";
      return;
    }

    let text: string | null;
    try {
      text = await this.deps.source.solutionText(s.exercise.id);
    } catch (err) {
      this.notify(`Could not read the solution: ${describeError(err)}`, "error");
      return;
    }
    if (text === null) {
      this.notify("No solution available for this exercise", "info");
      return;
    }
    const solution = this.newEditor(s.exercise);
    solution.load(text);
    s.solution = solution;
    s.view = "solution";
  }

  private showHint() {
    const s = this.state;
    const hint = s.exercise.hint;
    s.output = {
      title: `${ICON.hint} Hint`,
      lines: hint ? hint.split(/\r?\n/) : ["No hint for this exercise."],
      tone: "hint",
    };
    s.outputScroll = 0;
  }

  // ─── Watching ───────────────────────────────────────────────────────────

  private setWatching(on: boolean) {
    const s = this.state;
    s.watchEnabled = on;
    if (on) this.deps.watcher.watch(s.exercise.path);
    else this.deps.watcher.unwatch();
    this.notify(`Watching ${on ? "on" : "off"}`, "info");
  }

  private async onFileChanged(filePath: string) {
    const s = this.state;
    if (!s.watchEnabled || filePath !== s.exercise.path) return;

    let text: string;
    try {
      text = await this.files.read(filePath);
    } catch (err) {
      // Usually a save in progress; the next event brings the final content.
      this.log.debug("changed file unreadable", { path: filePath, error: describeError(err) });
      return;
    }
    if (text === s.editor.serialize() || text === this.lastSynced) return;

    const cursor = s.editor.cursor;
    s.editor.load(text);
    this.lastSynced = text;
    s.editor.setCursor(cursor);
    s.editor.scrollToCursor(this.editorRows());
    this.notify(`${s.exercise.name} changed on disk; reloaded`, "info");
    this.log.info("reloaded after change", { exercise: s.exercise.id });
    if (this.deps.settings.runOnChange) this.startRun();
  }

  private onWatchError(error: WatcherError) {
    this.state.watchEnabled = false;
    this.notify(`${error.message}. Use :watch to try again`, "warning");
  }

  // ─── Helpers ────────────────────────────────────────────────────────────

  /** Stops whatever is running and makes any result still in flight stale. */
  private cancelRuns() {
    const s = this.state;
    if (s.checkingAll) {
      this.deps.runner.cancelAll();
      s.checkingAll = false;
    } else {
      this.deps.runner.cancel(s.exercise.id);
    }
    s.generation++;
  }

  private async save(): Promise<boolean> {
    const { exercise, editor } = this.state;
    const text = editor.serialize();
    try {
      await this.files.write(exercise.path, text);
    } catch (err) {
      this.log.error("save failed", { path: exercise.path, error: describeError(err) });
      this.notify(`Could not save ${exercise.name}: ${describeError(err)}`, "error");
      return false;
    }
    this.lastSynced = text;
    editor.markSaved();
    this.log.debug("saved", { path: exercise.path });
    return true;
  }

  /** The working copy, recreated from the template when it has gone missing. */
  private async readWorkingCopy(exercise: ExerciseDescriptor): Promise<string | null> {
    try {
      try {
        return await this.files.read(exercise.path);
      } catch (err) {
        if (!isMissingFile(err)) throw err;
      }
      const text = await this.deps.source.originalText(exercise.id);
      await this.files.write(exercise.path, text);
      this.log.info("restored missing working copy", { exercise: exercise.id });
      return text;
    } catch (err) {
      this.log.error("read failed", { path: exercise.path, error: describeError(err) });
      this.notify(`Could not read ${exercise.name}: ${describeError(err)}`, "error");
      return null;
    }
  }

  private async persist() {
    const err = await this.deps.progress.persist();
    if (err) this.notify(`${err.message}; progress kept in memory`, "warning");
  }

  private notify(text: string, tone: Tone) {
    this.state.status = { text, tone };
  }

  private newEditor(exercise: ExerciseDescriptor) {
    return new Editor({
      tabWidth: this.deps.settings.tabWidth,
      language: languageFor(exercise.path, this.deps.languages),
    });
  }

  private paneView(): PaneView {
    return this.state.view === "help" ? this.state.underHelp : this.state.view;
  }

  private editorRows(): number {
    const pane = computeLayout(this.state.viewport, this.paneView()).editor;
    return pane ? inner(pane).height : 1;
  }

  private maxScroll(): number {
    return maxOutputScroll(this.state.output.lines, this.state.viewport, this.paneView());
  }

  private clampOutputScroll() {
    const s = this.state;
    s.outputScroll = Math.max(0, Math.min(s.outputScroll, this.maxScroll()));
  }

  private allDone() {
    return this.deps.progress.doneCount === this.deps.source.exercises.length;
  }

  private finalPanel(): OutputPanel {
    return {
      title: `${ICON.pass} Complete`,
      lines: this.deps.source.finalMessage.split(/\r?\n/),
      tone: "success",
    };
  }
}

function initialIndex(exercises: readonly ExerciseDescriptor[], progress: ProgressTracker) {
  const current = exercises.findIndex((e) => e.id === progress.current);
  if (current >= 0) return current;
  const pending = exercises.findIndex((e) => !progress.isDone(e.id));
  return pending >= 0 ? pending : 0;
}

function intro(exercise: ExerciseDescriptor, done: boolean): OutputPanel {
  const lines = [`${ICON.info} ${exercise.name}: edit the file, then :c to check it.`];
  if (done) lines.push(`${ICON.pass} Already done.`);
  return { title: "Output", lines, tone: "info" };
}
