import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

import { ConfigError, describeError } from "../errors.js";

export const LanguageDefinitionSchema = z.object({
  name: z.string().min(1),
  extensions: z.array(z.string().startsWith(".")).default([]),
  keywords: z.array(z.string()).default([]),
  types: z.array(z.string()).default([]),
  punctuation: z.string().default(""),
  operators: z.string().default(""),
  lineComment: z.array(z.string().min(1)).default([]),
  blockComment: z
    .object({
      open: z.string().min(1),
      close: z.string().min(1),
      nested: z.boolean().default(false),
    })
    .nullable()
    .default(null),
  // Longer delimiters first so `"""` wins over `"`.
  strings: z.array(z.string().min(1)).default([]),
  escape: z.string().length(1).nullable().default(null),
});

export type LanguageDefinition = z.input<typeof LanguageDefinitionSchema>;

export type Language = {
  name: string;
  extensions: readonly string[];
  keywords: ReadonlySet<string>;
  types: ReadonlySet<string>;
  punctuation: ReadonlySet<string>;
  operators: ReadonlySet<string>;
  lineComment: readonly string[];
  blockComment: { open: string; close: string; nested: boolean } | null;
  strings: readonly string[];
  escape: string | null;
};

export function compileLanguage(def: LanguageDefinition): Language {
  const d = LanguageDefinitionSchema.parse(def);
  return {
    name: d.name,
    extensions: d.extensions,
    keywords: new Set(d.keywords),
    types: new Set(d.types),
    punctuation: new Set(d.punctuation),
    operators: new Set(d.operators),
    lineComment: d.lineComment,
    blockComment: d.blockComment,
    strings: [...d.strings].sort((a, b) => b.length - a.length),
    escape: d.escape,
  };
}

export const PLAIN_TEXT: Language = compileLanguage({ name: "text" });

export const LANGUAGES_DIR = new URL("../../languages/", import.meta.url);

/** Read every `*.json` language definition in `dir`. */
export function loadLanguages(dir: URL | string = LANGUAGES_DIR): Language[] {
  const root = typeof dir === "string" ? dir : fileURLToPath(dir);
  let files: string[];
  try {
    files = fs.readdirSync(root).filter((f) => f.endsWith(".json")).sort();
  } catch (err) {
    throw new ConfigError(`Could not list languages in ${root}: ${describeError(err)}`, {
      cause: err,
    });
  }
  return files.map((file) => {
    const full = path.join(root, file);
    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(full, "utf8"));
    } catch (err) {
      throw new ConfigError(`Could not read ${full}: ${describeError(err)}`, { cause: err });
    }
    const parsed = LanguageDefinitionSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigError(`Invalid language file ${full}: ${parsed.error.message}`);
    }
    return compileLanguage(parsed.data);
  });
}

export function languageFor(filePath: string, languages: readonly Language[]): Language {
  const ext = path.extname(filePath).toLowerCase();
  return languages.find((l) => l.extensions.includes(ext)) ?? PLAIN_TEXT;
}
