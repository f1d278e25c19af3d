export type EditId =
  | "line.delete"
  | "line.yank"
  | "word.delete-inner"
  | "word.delete-around"
  | "word.change-inner"
  | "word.change-around"
  | "cursor.first-line"
  | "char.replace";

export type KeyNode =
  | { kind: "group"; title: string; children: Record<string, KeyNode> }
  | { kind: "cmd"; title: string; editId: EditId }
  // Takes the next key as its argument, like `r<char>`.
  | { kind: "arg"; title: string; editId: EditId };

export function group(
  title: string,
  children: Record<string, KeyNode>,
): KeyNode {
  return { kind: "group", title, children };
}
export function cmd(title: string, editId: EditId): KeyNode {
  return { kind: "cmd", title, editId };
}
export function arg(title: string, editId: EditId): KeyNode {
  return { kind: "arg", title, editId };
}

// Multi-key NORMAL mode sequences. Single keys live in the editor's switch.
export const sequenceMap: KeyNode = group("normal", {
  d: group("delete", {
    d: cmd("Delete line", "line.delete"),
    i: group("inner", { w: cmd("Delete inner word", "word.delete-inner") }),
    a: group("around", { w: cmd("Delete around word", "word.delete-around") }),
  }),
  c: group("change", {
    i: group("inner", { w: cmd("Change inner word", "word.change-inner") }),
    a: group("around", { w: cmd("Change around word", "word.change-around") }),
  }),
  y: group("yank", {
    y: cmd("Yank line", "line.yank"),
  }),
  g: group("goto", {
    g: cmd("First line", "cursor.first-line"),
  }),
  r: arg("Replace character", "char.replace"),
});

export function getHints(
  node: KeyNode,
): Array<{ key: string; title: string; kind: KeyNode["kind"] }> {
  if (node.kind !== "group") return [];
  return Object.entries(node.children).map(([key, child]) => ({
    key,
    title: child.title,
    kind: child.kind,
  }));
}

export function stepSequence(node: KeyNode, key: string): KeyNode | null {
  if (node.kind !== "group") return null;
  return Object.hasOwn(node.children, key) ? (node.children[key] ?? null) : null;
}
