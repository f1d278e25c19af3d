#!/usr/bin/env node
import path from "node:path";
import { Command } from "commander";
import { z } from "zod";

import { loadConfig, type TutorConfig } from "./config.js";
import { ConfigError } from "./errors.js";
import { ExerciseCatalog, MANIFEST_FILE_NAME } from "./exercises/catalog.js";
import { findCourseRoot } from "./exercises/project.js";
import { loadLanguages } from "./highlight/language.js";
import { FileLog } from "./log.js";
import { ProgressTracker } from "./progress/tracker.js";
import { successMatcher } from "./runner/classify.js";
import { ExerciseRunner } from "./runner/runner.js";
import { Channel } from "./session/channel.js";
import { SessionController } from "./session/controller.js";
import { runSession } from "./session/loop.js";
import type { SessionEvent } from "./session/state.js";
import { renderFrame } from "./ui/render.js";
import { Terminal } from "./ui/terminal.js";
import { FileWatcher } from "./watch/watcher.js";

const CliOptionsSchema = z.object({
  toolchain: z.string().min(1).optional(),
  watch: z.boolean(),
  autoAdvance: z.boolean(),
  logLevel: z.enum(["debug", "info", "warn", "error"]).optional(),
});

type CliOptions = z.infer<typeof CliOptionsSchema>;

function applyCli(config: TutorConfig, opts: CliOptions): TutorConfig {
  return {
    ...config,
    toolchain: { ...config.toolchain, command: opts.toolchain ?? config.toolchain.command },
    watch: { ...config.watch, enabled: config.watch.enabled && opts.watch },
    session: { ...config.session, autoAdvance: config.session.autoAdvance && opts.autoAdvance },
    logLevel: opts.logLevel ?? config.logLevel,
  };
}

async function start(courseDir: string, rawOpts: unknown) {
  const parsed = CliOptionsSchema.safeParse(rawOpts);
  if (!parsed.success) {
    throw new ConfigError(`Invalid options: ${parsed.error.issues.map((i) => i.message).join("; ")}`);
  }

  const root = findCourseRoot(courseDir);
  if (!root) {
    throw new ConfigError(`No ${MANIFEST_FILE_NAME} in ${path.resolve(courseDir)} or above it`);
  }
  const config = applyCli(await loadConfig(root), parsed.data);

  const fileLog = new FileLog(path.resolve(root, config.logFile));
  const log = fileLog.logger(config.logLevel);
  log.info("starting", { root, toolchain: config.toolchain.command });

  const catalog = await ExerciseCatalog.load(root);
  await catalog.ensureWorkingCopies(log.child("catalog"));
  const languages = loadLanguages();
  const progress = await ProgressTracker.load(
    path.resolve(root, config.progressFile),
    catalog.exercises.map((e) => e.id),
    log.child("progress"),
  );

  const events = new Channel<SessionEvent>();
  const runner = new ExerciseRunner(
    {
      command: config.toolchain.command,
      args: config.toolchain.args,
      timeoutMs: config.toolchain.timeoutMs,
      successPattern: successMatcher(config.toolchain.successPattern),
      maxOutputBytes: config.toolchain.maxOutputBytes,
    },
    log.child("runner"),
  );
  const watcher = new FileWatcher(
    config.watch.debounceMs,
    {
      changed: (p) => events.push({ type: "file-changed", path: p }),
      failed: (error) => events.push({ type: "watch-error", error }),
    },
    log.child("watch"),
  );

  // Everything that can fail on bad input has run; the terminal is ours from here.
  const terminal = new Terminal("exercise-tutor");
  const controller = new SessionController({
    source: catalog,
    runner,
    watcher,
    progress,
    languages,
    settings: {
      autoAdvance: config.session.autoAdvance,
      watch: config.watch.enabled,
      runOnChange: config.watch.runOnChange,
      runOnSave: config.session.runOnSave,
      tabWidth: config.session.tabWidth,
    },
    emit: (event) => events.push(event),
    log,
    viewport: terminal.size,
  });

  const redraw = () => terminal.draw(renderFrame(controller.snapshot(), terminal.size, Date.now()));
  const tick = setInterval(redraw, config.session.tickMs);

  try {
    await controller.start();
    terminal.listen({
      key: (key) => events.push({ type: "key", key }),
      resize: (size) => events.push({ type: "resize", size }),
      interrupt: () => events.close(),
    });
    await runSession(controller, events, redraw, log);
  } finally {
    clearInterval(tick);
    terminal.destroy();
    log.info("stopped");
    await fileLog.close();
  }
  if (fileLog.lastError) console.error(`exercise-tutor: log file: ${fileLog.lastError.message}`);
}

const program = new Command()
  .name("exercise-tutor")
  .description("Work through a course of programming exercises in a terminal editor")
  .argument("[course-dir]", `directory containing ${MANIFEST_FILE_NAME} (or below it)`, ".")
  .option("--toolchain <command>", "toolchain command, overrides the config file")
  .option("--no-watch", "do not watch the exercise file for changes")
  .option("--no-auto-advance", "stay on an exercise after it passes")
  .option("--log-level <level>", "debug, info, warn or error")
  .action((courseDir: string, opts: unknown) => start(courseDir, opts));

// The terminal library keeps stdin referenced after the screen is destroyed.
program.parseAsync(process.argv).then(
  () => process.exit(),
  (err: unknown) => {
    if (err instanceof ConfigError) {
      console.error(`exercise-tutor: ${err.message}`);
      process.exit(2);
    }
    console.error(err);
    process.exit(1);
  },
);
