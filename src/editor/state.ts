export type Operator = "y" | "d" | "c";

export type Mode =
  | { kind: "NORMAL" }
  | { kind: "INSERT" }
  | { kind: "VISUAL" }
  | { kind: "OPERATOR"; op: Operator };

export const NORMAL: Mode = { kind: "NORMAL" };
export const INSERT: Mode = { kind: "INSERT" };
export const VISUAL: Mode = { kind: "VISUAL" };

export function operatorMode(op: Operator): Mode {
  return { kind: "OPERATOR", op };
}

export function isOperator(key: string): key is Operator {
  return key === "y" || key === "d" || key === "c";
}

export function modeLabel(mode: Mode): string {
  return mode.kind === "OPERATOR" ? `OPERATOR(${mode.op})` : mode.kind;
}

export function modeHelp(mode: Mode): string {
  switch (mode.kind) {
    case "NORMAL":
      return "type i to enter insert mode";
    case "INSERT":
      return "type Esc to go back to normal mode";
    case "VISUAL":
      return "type y to yank, d to delete, Esc to go back to normal mode";
    case "OPERATOR":
      return "move the cursor to apply the operator";
  }
}

export type Cursor = { row: number; col: number };

export type KeyInput = {
  key: string; // printable character, or a name such as "escape", "enter", "up"
  ctrl: boolean;
  meta: boolean;
};

export type Transition =
  | { kind: "none" }
  | { kind: "mode"; mode: Mode }
  | { kind: "pending"; key: KeyInput };
