import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";

import { ConfigError, describeError, isMissingFile } from "./errors.js";
import { LOG_LEVELS } from "./log.js";

export const CONFIG_FILE_NAME = "tutor.config.json";

const logLevel = z.enum(["debug", "info", "warn", "error"]);

export const ConfigSchema = z.object({
  toolchain: z
    .object({
      command: z.string().min(1).default("toolchain"),
      // Placed before `<mode> <path>` on the command line.
      args: z.array(z.string()).default([]),
      timeoutMs: z.number().int().positive().default(60_000),
      successPattern: z.string().default("^\\s*(?:ok|success)\\b"),
      maxOutputBytes: z.number().int().positive().default(64 * 1024),
    })
    .default({}),
  watch: z
    .object({
      enabled: z.boolean().default(true),
      debounceMs: z.number().int().nonnegative().default(150),
      runOnChange: z.boolean().default(true),
    })
    .default({}),
  session: z
    .object({
      autoAdvance: z.boolean().default(true),
      runOnSave: z.boolean().default(false),
      tickMs: z.number().int().positive().default(100),
      tabWidth: z.number().int().min(1).max(16).default(4),
    })
    .default({}),
  progressFile: z.string().default(".tutor-progress"),
  logFile: z.string().default(".tutor.log"),
  logLevel: logLevel.default("info"),
});

export type TutorConfig = z.infer<typeof ConfigSchema>;

export type Env = Record<string, string | undefined>;

export function parseConfig(raw: unknown, source = CONFIG_FILE_NAME): TutorConfig {
  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new ConfigError(`Invalid ${source}: ${issues}`);
  }
  try {
    new RegExp(parsed.data.toolchain.successPattern, "im");
  } catch (err) {
    throw new ConfigError(
      `Invalid ${source}: toolchain.successPattern: ${describeError(err)}`,
    );
  }
  return parsed.data;
}

/** Environment variables win over the file. */
export function applyEnv(config: TutorConfig, env: Env): TutorConfig {
  const next: TutorConfig = {
    ...config,
    toolchain: { ...config.toolchain },
  };
  if (env.TUTOR_TOOLCHAIN) next.toolchain.command = env.TUTOR_TOOLCHAIN;
  if (env.TUTOR_RUN_TIMEOUT_MS) {
    const ms = Number(env.TUTOR_RUN_TIMEOUT_MS);
    if (!Number.isInteger(ms) || ms <= 0) {
      throw new ConfigError(
        `TUTOR_RUN_TIMEOUT_MS must be a positive integer, got ${env.TUTOR_RUN_TIMEOUT_MS}`,
      );
    }
    next.toolchain.timeoutMs = ms;
  }
  if (env.TUTOR_LOG_LEVEL) {
    const level = logLevel.safeParse(env.TUTOR_LOG_LEVEL);
    if (!level.success) {
      throw new ConfigError(`TUTOR_LOG_LEVEL must be one of ${LOG_LEVELS.join(", ")}`);
    }
    next.logLevel = level.data;
  }
  return next;
}

export async function loadConfig(courseDir: string, env: Env = process.env): Promise<TutorConfig> {
  const file = path.join(courseDir, CONFIG_FILE_NAME);
  let raw: unknown = {};
  try {
    raw = JSON.parse(await fs.readFile(file, "utf8"));
  } catch (err) {
    if (!isMissingFile(err)) {
      throw new ConfigError(`Could not read ${file}: ${describeError(err)}`, { cause: err });
    }
  }
  return applyEnv(parseConfig(raw, file), env);
}
