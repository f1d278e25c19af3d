import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";

import { ConfigError } from "../errors.js";
import { compileLanguage, languageFor, loadLanguages, PLAIN_TEXT } from "./language.js";

describe("loadLanguages", () => {
  let dir: string | null = null;

  afterEach(() => {
    if (dir) fs.rmSync(dir, { recursive: true, force: true });
    dir = null;
  });

  it("reads the bundled definitions", () => {
    const langs = loadLanguages();
    expect(langs.map((l) => l.name)).toEqual(["python", "rust", "typescript"]);
    expect(languageFor("/course/src/main.RS", langs).name).toBe("rust");
    expect(languageFor("app.tsx", langs).name).toBe("typescript");
  });

  it("falls back to plain text for unknown extensions", () => {
    expect(languageFor("notes.txt", loadLanguages())).toBe(PLAIN_TEXT);
  });

  it("rejects a malformed definition", () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "langs-"));
    fs.writeFileSync(path.join(dir, "bad.json"), JSON.stringify({ name: "bad", extensions: ["x"] }));
    expect(() => loadLanguages(dir ?? "")).toThrow(ConfigError);
  });

  it("reports unreadable JSON with the file name", () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "langs-"));
    const file = path.join(dir, "broken.json");
    fs.writeFileSync(file, "{");
    expect(() => loadLanguages(dir ?? "")).toThrow(`Could not read ${file}`);
  });
});

describe("compileLanguage", () => {
  it("orders string delimiters longest first", () => {
    const lang = compileLanguage({ name: "py", strings: ['"', '"""', "'"] });
    expect(lang.strings).toEqual(['"""', '"', "'"]);
  });
});
