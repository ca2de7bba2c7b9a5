import type { Cursor } from "./state.js";

export type CursorMove =
  | "back"
  | "forward"
  | "up"
  | "down"
  | "wordForward"
  | "wordEnd"
  | "wordBack"
  | "head"
  | "end"
  | "top"
  | "bottom";

type Snapshot = { lines: string[]; cursor: Cursor };

const HISTORY_LIMIT = 100;

// Columns count code points, not UTF-16 units.
export function cpLen(s: string): number {
  return [...s].length;
}

export function cpSlice(s: string, start: number, end?: number): string {
  return [...s].slice(start, end).join("");
}

type CharKind = "space" | "word" | "punct";

function charKind(ch: string | undefined): CharKind {
  if (ch === undefined || /\s/u.test(ch)) return "space";
  if (/[\p{L}\p{N}_]/u.test(ch)) return "word";
  return "punct";
}

function comparePos(a: Cursor, b: Cursor): number {
  return a.row === b.row ? a.col - b.col : a.row - b.row;
}

export class TextBuffer {
  lines: string[] = [""];

  private pos: Cursor = { row: 0, col: 0 };
  private anchor: Cursor | null = null;
  private register = "";
  private undoStack: Snapshot[] = [];
  private redoStack: Snapshot[] = [];

  constructor(text = "") {
    this.lines = splitLines(text);
  }

  get cursor(): Cursor {
    return { ...this.pos };
  }

  /** Text held by the last copy or cut. */
  get yanked(): string {
    return this.register;
  }

  text(): string {
    return this.lines.join("\n");
  }

  setText(text: string) {
    this.record();
    this.lines = splitLines(text);
    this.pos = { row: 0, col: 0 };
    this.anchor = null;
  }

  lineCount() {
    return this.lines.length;
  }

  lineAt(row: number) {
    return this.lines[row] ?? "";
  }

  lineLength(row: number) {
    return cpLen(this.lineAt(row));
  }

  setCursor(row: number, col: number) {
    const r = Math.max(0, Math.min(row, this.lines.length - 1));
    const c = Math.max(0, Math.min(col, this.lineLength(r)));
    this.pos = { row: r, col: c };
  }

  move(motion: CursorMove) {
    const { row, col } = this.pos;
    const last = this.lines.length - 1;
    const len = this.lineLength(row);

    switch (motion) {
      case "back":
        if (col > 0) this.pos = { row, col: col - 1 };
        else if (row > 0) {
          this.pos = { row: row - 1, col: this.lineLength(row - 1) };
        }
        return;
      case "forward":
        if (col < len) this.pos = { row, col: col + 1 };
        else if (row < last) this.pos = { row: row + 1, col: 0 };
        return;
      case "up":
        if (row > 0) this.setCursor(row - 1, col);
        return;
      case "down":
        if (row < last) this.setCursor(row + 1, col);
        return;
      case "head":
        this.pos = { row, col: 0 };
        return;
      case "end":
        this.pos = { row, col: len };
        return;
      case "top":
        this.pos = { row: 0, col: 0 };
        return;
      case "bottom":
        this.pos = { row: last, col: 0 };
        return;
      case "wordForward":
        this.pos = this.wordForward();
        return;
      case "wordEnd":
        this.pos = this.wordEnd();
        return;
      case "wordBack":
        this.pos = this.wordBack();
        return;
    }
  }

  private wordForward(): Cursor {
    const { row, col } = this.pos;
    const chars = [...this.lineAt(row)];
    for (let i = col + 1; i < chars.length; i++) {
      const kind = charKind(chars[i]);
      if (kind !== "space" && kind !== charKind(chars[i - 1])) {
        return { row, col: i };
      }
    }
    if (row + 1 < this.lines.length) return { row: row + 1, col: 0 };
    return { row, col: chars.length };
  }

  private wordEnd(): Cursor {
    let { row, col } = this.pos;
    let start = col + 1;
    while (row < this.lines.length) {
      const chars = [...this.lineAt(row)];
      for (let i = start; i < chars.length; i++) {
        const kind = charKind(chars[i]);
        if (kind !== "space" && kind !== charKind(chars[i + 1])) {
          return { row, col: i };
        }
      }
      row++;
      start = 0;
    }
    const last = this.lines.length - 1;
    return { row: last, col: this.lineLength(last) };
  }

  private wordBack(): Cursor {
    const { row, col } = this.pos;
    const chars = [...this.lineAt(row)];
    for (let i = Math.min(col, chars.length) - 1; i >= 0; i--) {
      const kind = charKind(chars[i]);
      const startsWord = i === 0 || kind !== charKind(chars[i - 1]);
      if (kind !== "space" && startsWord) return { row, col: i };
    }
    if (row > 0) return { row: row - 1, col: this.lineLength(row - 1) };
    return { row, col: 0 };
  }

  // ── Selection ───────────────────────────────────────────────────────

  startSelection() {
    this.anchor = { ...this.pos };
  }

  cancelSelection() {
    this.anchor = null;
  }

  hasSelection() {
    return this.anchor !== null;
  }

  /** Ordered [start, end) of the selection, or null without a selection. */
  selectionRange(): [Cursor, Cursor] | null {
    if (!this.anchor) return null;
    return comparePos(this.anchor, this.pos) <= 0
      ? [{ ...this.anchor }, { ...this.pos }]
      : [{ ...this.pos }, { ...this.anchor }];
  }

  /**
   * Extend the selection by one character at its far end so that the
   * character under the cursor is part of it.
   */
  selectInclusive() {
    if (!this.anchor) return;
    if (comparePos(this.anchor, this.pos) <= 0) {
      this.move("forward");
    } else {
      this.anchor = this.step(this.anchor);
    }
  }

  /**
   * Select the cursor's line: from its start to the start of the next line,
   * or to the end of the line when it is the last one.
   */
  selectCurrentLine() {
    const { row } = this.pos;
    this.pos = { row, col: 0 };
    this.startSelection();
    if (row + 1 < this.lines.length) this.pos = { row: row + 1, col: 0 };
    else this.pos = { row, col: this.lineLength(row) };
  }

  selectedText(): string {
    const range = this.selectionRange();
    return range ? this.textIn(range[0], range[1]) : "";
  }

  /** Yank the selection into the register and drop the selection. */
  copy(): string | null {
    const range = this.selectionRange();
    this.anchor = null;
    if (!range) return null;
    const text = this.textIn(range[0], range[1]);
    if (text) this.register = text;
    return text;
  }

  /** Remove the selection, yanking it. The cursor lands on its start. */
  cut(): string | null {
    const range = this.selectionRange();
    this.anchor = null;
    if (!range) return null;
    const [start, end] = range;
    const removed = this.textIn(start, end);
    if (removed) {
      this.record();
      this.removeRange(start, end);
      this.register = removed;
    }
    this.pos = start;
    return removed;
  }

  paste(): boolean {
    if (!this.register) return false;
    this.insertText(this.register);
    return true;
  }

  // ── Editing ─────────────────────────────────────────────────────────

  insertChar(ch: string) {
    this.insertText(ch);
  }

  insertText(text: string) {
    if (!text) return;
    this.record();
    const { row, col } = this.pos;
    const line = this.lineAt(row);
    const before = cpSlice(line, 0, col);
    const after = cpSlice(line, col);
    const parts = text.replace(/\r\n/g, "\n").split("\n");
    const lastPart = parts[parts.length - 1] ?? "";
    const inserted =
      parts.length === 1
        ? [before + lastPart + after]
        : [before + parts[0], ...parts.slice(1, -1), lastPart + after];
    this.lines.splice(row, 1, ...inserted);
    this.pos =
      parts.length === 1
        ? { row, col: col + cpLen(lastPart) }
        : { row: row + parts.length - 1, col: cpLen(lastPart) };
  }

  insertNewline() {
    this.insertText("\n");
  }

  deleteCharBackward() {
    const { row, col } = this.pos;
    if (col === 0 && row === 0) return;
    const start =
      col > 0
        ? { row, col: col - 1 }
        : { row: row - 1, col: this.lineLength(row - 1) };
    this.record();
    this.removeRange(start, { row, col });
    this.pos = start;
  }

  deleteNextChar() {
    const { row, col } = this.pos;
    if (col >= this.lineLength(row)) return;
    this.record();
    this.removeRange({ row, col }, { row, col: col + 1 });
  }

  deleteToLineEnd(): string {
    const { row, col } = this.pos;
    const len = this.lineLength(row);
    if (col >= len) return "";
    const removed = cpSlice(this.lineAt(row), col);
    this.record();
    this.removeRange({ row, col }, { row, col: len });
    this.register = removed;
    return removed;
  }

  // ── History ─────────────────────────────────────────────────────────

  undo(): boolean {
    const prev = this.undoStack.pop();
    if (!prev) return false;
    this.redoStack.push(this.snapshot());
    this.restore(prev);
    return true;
  }

  redo(): boolean {
    const next = this.redoStack.pop();
    if (!next) return false;
    this.undoStack.push(this.snapshot());
    this.restore(next);
    return true;
  }

  private snapshot(): Snapshot {
    return { lines: [...this.lines], cursor: { ...this.pos } };
  }

  private restore(s: Snapshot) {
    this.lines = [...s.lines];
    this.pos = { ...s.cursor };
    this.anchor = null;
  }

  private record() {
    this.undoStack.push(this.snapshot());
    if (this.undoStack.length > HISTORY_LIMIT) this.undoStack.shift();
    this.redoStack = [];
  }

  private step(p: Cursor): Cursor {
    if (p.col < this.lineLength(p.row)) return { row: p.row, col: p.col + 1 };
    if (p.row + 1 < this.lines.length) return { row: p.row + 1, col: 0 };
    return p;
  }

  private textIn(start: Cursor, end: Cursor): string {
    if (start.row === end.row) {
      return cpSlice(this.lineAt(start.row), start.col, end.col);
    }
    const out = [cpSlice(this.lineAt(start.row), start.col)];
    for (let r = start.row + 1; r < end.row; r++) out.push(this.lineAt(r));
    out.push(cpSlice(this.lineAt(end.row), 0, end.col));
    return out.join("\n");
  }

  private removeRange(start: Cursor, end: Cursor) {
    const before = cpSlice(this.lineAt(start.row), 0, start.col);
    const after = cpSlice(this.lineAt(end.row), end.col);
    this.lines.splice(start.row, end.row - start.row + 1, before + after);
  }
}

function splitLines(text: string): string[] {
  const lines = text.replace(/\r\n/g, "\n").split("\n");
  return lines.length === 0 ? [""] : lines;
}
