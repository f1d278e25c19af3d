import { closestMatch } from "./fuzzy.js";

export type CommandAction =
  | { type: "save" }
  | { type: "quit"; force: boolean }
  | { type: "save-and-quit" }
  | { type: "check" }
  | { type: "next" }
  | { type: "previous" }
  | { type: "toggle-solution" }
  | { type: "toggle-auto-advance" }
  | { type: "toggle-watch" }
  | { type: "reload" }
  | { type: "reset" }
  | { type: "show-hint" }
  | { type: "help" }
  | { type: "unknown"; input: string; suggestion: string | null };

export type KnownAction = Exclude<CommandAction, { type: "unknown" }>;

type CommandEntry = {
  names: readonly string[];
  action: KnownAction;
  help: string;
};

export const COMMANDS: readonly CommandEntry[] = [
  { names: ["w"], action: { type: "save" }, help: "Save file" },
  { names: ["c", "check"], action: { type: "check" }, help: "Save and check the exercise" },
  { names: ["h", "hint"], action: { type: "show-hint" }, help: "Show hint" },
  { names: ["s", "sol", "solution"], action: { type: "toggle-solution" }, help: "Toggle solution view" },
  { names: ["n", "next"], action: { type: "next" }, help: "Next exercise" },
  { names: ["p", "prev"], action: { type: "previous" }, help: "Previous exercise" },
  { names: ["auto"], action: { type: "toggle-auto-advance" }, help: "Toggle auto-advance" },
  { names: ["watch"], action: { type: "toggle-watch" }, help: "Toggle file watching" },
  { names: ["r", "reload"], action: { type: "reload" }, help: "Reload exercise from disk" },
  { names: ["reset"], action: { type: "reset" }, help: "Restore the original exercise" },
  { names: ["help"], action: { type: "help" }, help: "Show help" },
  { names: ["q"], action: { type: "quit", force: false }, help: "Quit (warns on unsaved changes)" },
  { names: ["q!"], action: { type: "quit", force: true }, help: "Quit without saving" },
  { names: ["wq", "x"], action: { type: "save-and-quit" }, help: "Save and quit" },
];

const BY_NAME: ReadonlyMap<string, KnownAction> = new Map(
  COMMANDS.flatMap((c) => c.names.map((n) => [n, c.action] as const)),
);

// Only the long names are worth suggesting; one-letter aliases match everything.
const SUGGESTIBLE = COMMANDS.flatMap((c) => c.names).filter((n) => n.length > 1);

/** Every string maps to exactly one action; anything unrecognised is `unknown`. */
export function parseCommand(input: string): CommandAction {
  const name = input.trim();
  const action = BY_NAME.get(name);
  if (action) return { ...action };
  return { type: "unknown", input: name, suggestion: closestMatch(name, SUGGESTIBLE) };
}
