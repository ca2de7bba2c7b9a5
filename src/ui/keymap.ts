import type { KeyInput } from "../editor/state.js";

export type CommandId =
  | "query.run"
  | "focus.toggle"
  | "quit"
  | "grid.row.next"
  | "grid.row.previous"
  | "grid.column.next"
  | "grid.column.previous"
  | "grid.scroll.right"
  | "grid.scroll.left"
  | "grid.page.next"
  | "grid.page.previous"
  | "grid.row.first"
  | "grid.row.last"
  | "grid.width.grow"
  | "grid.width.shrink"
  | "grid.copy.cell"
  | "grid.copy.row"
  | "tab.next"
  | "tab.previous";

export type KeyBinding = { keys: string[]; commandId: CommandId };

export function bind(
  keys: string | string[],
  commandId: CommandId,
): KeyBinding {
  return { keys: Array.isArray(keys) ? keys : [keys], commandId };
}

/** Bindings that apply whatever pane has focus. */
export const globalBindings: KeyBinding[] = [
  bind("f5", "query.run"),
  bind("tab", "focus.toggle"),
  bind("C-q", "quit"),
];

export const gridBindings: KeyBinding[] = [
  bind(["j", "down"], "grid.row.next"),
  bind(["k", "up"], "grid.row.previous"),
  bind("l", "grid.column.next"),
  bind("h", "grid.column.previous"),
  bind([">", "right"], "grid.scroll.right"),
  bind(["<", "left"], "grid.scroll.left"),
  bind(["n", "pagedown"], "grid.page.next"),
  bind(["p", "pageup"], "grid.page.previous"),
  bind("g", "grid.row.first"),
  bind("G", "grid.row.last"),
  bind("w", "grid.width.grow"),
  bind("W", "grid.width.shrink"),
  bind("y", "grid.copy.cell"),
  bind("Y", "grid.copy.row"),
  bind("]", "tab.next"),
  bind("[", "tab.previous"),
  bind("q", "quit"),
];

/** "C-r", "M-x", "f5", "G": the notation bindings are written in. */
export function keyName(input: KeyInput): string {
  return `${input.ctrl ? "C-" : ""}${input.meta ? "M-" : ""}${input.key}`;
}

export function lookup(
  bindings: KeyBinding[],
  input: KeyInput,
): CommandId | null {
  const name = keyName(input);
  return bindings.find((b) => b.keys.includes(name))?.commandId ?? null;
}

/** A digit 1-9 typed in the grid, as a zero-based tab index. */
export function digitTab(input: KeyInput): number | null {
  if (input.ctrl || input.meta || !/^[1-9]$/.test(input.key)) return null;
  return Number(input.key) - 1;
}
