import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";

import { ConfigError, describeError, isMissingFile } from "../errors.js";
import type { Logger } from "../log.js";
import type { ExerciseDescriptor, ExerciseSource, RunMode } from "./types.js";

export const MANIFEST_FILE_NAME = "exercises.json";

const ExerciseEntrySchema = z.object({
  // `@` is reserved by the progress record.
  id: z.string().regex(/^[A-Za-z0-9_.-]+$/, "letters, digits, _ . - only"),
  name: z.string().min(1).optional(),
  path: z.string().min(1),
  template: z.string().min(1),
  solution: z.string().min(1).optional(),
  hint: z.string().default(""),
  test: z.boolean().default(false),
  lint: z.boolean().default(false),
  cwd: z.string().min(1).optional(),
});

export const ManifestSchema = z
  .object({
    finalMessage: z.string().default("All exercises complete!"),
    exercises: z.array(ExerciseEntrySchema).min(1),
  })
  .superRefine((m, ctx) => {
    const seen = new Set<string>();
    m.exercises.forEach((e, i) => {
      if (seen.has(e.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["exercises", i, "id"],
          message: `duplicate id ${e.id}`,
        });
      }
      seen.add(e.id);
    });
  });

export type Manifest = z.infer<typeof ManifestSchema>;
type Entry = Manifest["exercises"][number];

export class ExerciseCatalog implements ExerciseSource {
  readonly exercises: readonly ExerciseDescriptor[];
  private readonly entries: ReadonlyMap<string, Entry>;

  private constructor(
    readonly root: string,
    private readonly manifest: Manifest,
  ) {
    this.exercises = manifest.exercises.map((e, ordinal) => toDescriptor(root, e, ordinal));
    this.entries = new Map(manifest.exercises.map((e) => [e.id, e]));
  }

  static fromManifest(root: string, raw: unknown): ExerciseCatalog {
    const parsed = ManifestSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
        .join("; ");
      throw new ConfigError(`Invalid ${MANIFEST_FILE_NAME}: ${issues}`);
    }
    return new ExerciseCatalog(path.resolve(root), parsed.data);
  }

  static async load(root: string): Promise<ExerciseCatalog> {
    const file = path.join(root, MANIFEST_FILE_NAME);
    let raw: unknown;
    try {
      raw = JSON.parse(await fs.readFile(file, "utf8"));
    } catch (err) {
      throw new ConfigError(`Could not read ${file}: ${describeError(err)}`, { cause: err });
    }
    return ExerciseCatalog.fromManifest(root, raw);
  }

  get finalMessage() {
    return this.manifest.finalMessage;
  }

  async originalText(id: string): Promise<string> {
    return fs.readFile(this.resolve(this.entry(id).template), "utf8");
  }

  async solutionText(id: string): Promise<string | null> {
    const solution = this.entry(id).solution;
    if (!solution) return null;
    try {
      return await fs.readFile(this.resolve(solution), "utf8");
    } catch (err) {
      if (isMissingFile(err)) return null;
      throw err;
    }
  }

  /** Write the template of every exercise whose working copy does not exist yet. */
  async ensureWorkingCopies(log: Logger): Promise<number> {
    let written = 0;
    for (const ex of this.exercises) {
      try {
        await fs.access(ex.path);
        continue;
      } catch (err) {
        if (!isMissingFile(err)) throw err;
      }
      await fs.mkdir(path.dirname(ex.path), { recursive: true });
      await fs.writeFile(ex.path, await this.originalText(ex.id), "utf8");
      log.info("wrote working copy", { exercise: ex.id, path: ex.path });
      written++;
    }
    return written;
  }

  private entry(id: string): Entry {
    const e = this.entries.get(id);
    if (!e) throw new ConfigError(`No exercise with id ${id}`);
    return e;
  }

  private resolve(p: string) {
    return path.resolve(this.root, p);
  }
}

function toDescriptor(root: string, e: Entry, ordinal: number): ExerciseDescriptor {
  const modes: RunMode[] = ["check"];
  if (e.test) modes.push("test");
  if (e.lint) modes.push("lint");
  const file = path.resolve(root, e.path);
  return Object.freeze({
    id: e.id,
    name: e.name ?? path.basename(e.path),
    path: file,
    ordinal,
    hint: e.hint.trim(),
    modes: Object.freeze(modes),
    cwd: e.cwd ? path.resolve(root, e.cwd) : root,
  });
}
