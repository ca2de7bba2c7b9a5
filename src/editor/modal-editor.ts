import { TextBuffer, type CursorMove } from "./buffer.js";
import { sameKey } from "./keys.js";
import {
  INSERT,
  NORMAL,
  VISUAL,
  isOperator,
  operatorMode,
  type Cursor,
  type KeyInput,
  type Mode,
  type Operator,
  type Transition,
} from "./state.js";
import { SCROLL_KEYS, followCursor } from "./viewport.js";
import { copyToClipboard, type Clipboard } from "../clipboard.js";

const NONE: Transition = { kind: "none" };
const TAB_TEXT = "    ";

function to(mode: Mode): Transition {
  return { kind: "mode", mode };
}

const MOTIONS: Record<string, CursorMove> = {
  h: "back",
  j: "down",
  k: "up",
  l: "forward",
  w: "wordForward",
  e: "wordEnd",
  b: "wordBack",
  "^": "head",
  $: "end",
  G: "bottom",
};

const INSERT_MOTIONS: Record<string, CursorMove> = {
  left: "back",
  right: "forward",
  up: "up",
  down: "down",
  home: "head",
  end: "end",
};

/**
 * Vim-style modal editing over a TextBuffer.
 *
 * `handleKey` interprets one key press in the current mode, applies the
 * resulting transition to the editor and returns it. A key that matches
 * nothing outside insert mode comes back as a `pending` transition and is
 * kept for exactly one more dispatch, which is how `gg` is recognised.
 *
 * The editor also tracks the first visible line of a view `viewHeight` lines
 * tall: it follows the cursor, and ctrl-e/y/d/u/f/b scroll it, pulling the
 * cursor back into view.
 */
export class ModalEditor {
  readonly buffer: TextBuffer;
  private readonly clipboard: Clipboard;
  private current: Mode = NORMAL;
  private pending: KeyInput | null = null;
  private top = 0;
  private height = 0;

  constructor(clipboard: Clipboard, text = "") {
    this.clipboard = clipboard;
    this.buffer = new TextBuffer(text);
  }

  get mode(): Mode {
    return this.current;
  }

  get pendingKey(): KeyInput | null {
    return this.pending;
  }

  currentText(): string {
    return this.buffer.text();
  }

  cursor(): Cursor {
    return this.buffer.cursor;
  }

  /** First line shown in the view. */
  get scrollTop(): number {
    return this.top;
  }

  get viewHeight(): number {
    return this.height;
  }

  setViewHeight(height: number) {
    if (!Number.isFinite(height)) return;
    this.height = Math.max(0, Math.floor(height));
    this.follow();
  }

  setText(text: string) {
    this.buffer.setText(text);
    this.current = NORMAL;
    this.pending = null;
    this.top = 0;
  }

  clear() {
    this.setText("");
  }

  handleKey(input: KeyInput): Transition {
    if (!input.key) return NONE;

    const transition =
      this.current.kind === "INSERT"
        ? this.insertKey(input)
        : this.commandKey(input);

    if (transition.kind === "pending") {
      this.pending = transition.key;
    } else {
      this.pending = null;
      if (transition.kind === "mode") this.enter(transition.mode);
    }
    this.follow();
    return transition;
  }

  private follow() {
    this.top = followCursor(this.top, this.buffer.cursor.row, this.height);
  }

  /** Move the view `lines` lines and keep the cursor on a visible line. */
  private scroll(lines: number) {
    const buf = this.buffer;
    const last = buf.lineCount() - 1;
    this.top = Math.max(0, Math.min(this.top + lines, last));
    const bottom = this.top + Math.max(1, this.height) - 1;
    const { row, col } = buf.cursor;
    if (row < this.top) buf.setCursor(this.top, col);
    else if (row > bottom) buf.setCursor(bottom, col);
  }

  private enter(mode: Mode) {
    if (mode.kind === "NORMAL" || mode.kind === "INSERT") {
      this.buffer.cancelSelection();
    }
    this.current = mode;
  }

  private insertKey(input: KeyInput): Transition {
    const { key, ctrl, meta } = input;
    const buf = this.buffer;

    if (key === "escape" || (ctrl && key === "c")) return to(NORMAL);

    const motion = INSERT_MOTIONS[key];
    if (motion && !ctrl) {
      buf.move(motion);
    } else if (key === "enter") {
      buf.insertNewline();
    } else if (key === "backspace") {
      buf.deleteCharBackward();
    } else if (key === "delete") {
      buf.deleteNextChar();
    } else if (key === "tab") {
      buf.insertText(TAB_TEXT);
    } else if (!ctrl && !meta && [...key].length === 1) {
      buf.insertChar(key);
    }
    return to(INSERT);
  }

  private commandKey(input: KeyInput): Transition {
    const { key, ctrl, meta } = input;
    const buf = this.buffer;
    const mode = this.current;

    if (meta) return { kind: "pending", key: input };

    if (ctrl) {
      if (key === "r") {
        buf.cancelSelection();
        buf.redo();
        return to(NORMAL);
      }
      const scroll = SCROLL_KEYS[key];
      if (scroll) {
        this.scroll(scroll(this.height));
        return this.applyOperator();
      }
      return { kind: "pending", key: input };
    }

    const motion =
      key === "g" && sameKey(this.pending, input) ? "top" : MOTIONS[key];
    if (motion) {
      buf.move(motion);
      // `e` is inclusive: an operator also takes the word's last character.
      if (key === "e" && mode.kind === "OPERATOR") buf.move("forward");
      return this.applyOperator();
    }

    switch (key) {
      case "p":
        buf.cancelSelection();
        buf.paste();
        return to(NORMAL);
      case "u":
        buf.cancelSelection();
        buf.undo();
        return to(NORMAL);
      case "escape":
        buf.cancelSelection();
        return to(NORMAL);
    }

    if (mode.kind === "NORMAL") return this.normalKey(input);

    if (mode.kind === "VISUAL") {
      if (key === "v") return to(NORMAL);
      if (isOperator(key)) {
        buf.selectInclusive();
        return this.runOperator(key);
      }
    }

    if (mode.kind === "OPERATOR" && key === mode.op) {
      buf.selectCurrentLine();
      return this.applyOperator();
    }

    return { kind: "pending", key: input };
  }

  private normalKey(input: KeyInput): Transition {
    const buf = this.buffer;

    switch (input.key) {
      case "i":
        return to(INSERT);
      case "a":
        if (buf.cursor.col < buf.lineLength(buf.cursor.row)) {
          buf.move("forward");
        }
        return to(INSERT);
      case "I":
        buf.move("head");
        return to(INSERT);
      case "A":
        buf.move("end");
        return to(INSERT);
      case "o":
        buf.move("end");
        buf.insertNewline();
        return to(INSERT);
      case "O":
        buf.move("head");
        buf.insertNewline();
        buf.move("up");
        return to(INSERT);
      case "v":
        buf.startSelection();
        return to(VISUAL);
      case "V":
        buf.move("head");
        buf.startSelection();
        buf.move("end");
        return to(VISUAL);
      case "x":
        buf.deleteNextChar();
        return to(NORMAL);
      case "D":
        this.yank(buf.deleteToLineEnd());
        return to(NORMAL);
      case "C":
        this.yank(buf.deleteToLineEnd());
        return to(INSERT);
    }

    if (isOperator(input.key)) {
      buf.startSelection();
      return to(operatorMode(input.key));
    }

    return { kind: "pending", key: input };
  }

  /** Completes a pending operator once its motion has moved the cursor. */
  private applyOperator(): Transition {
    return this.current.kind === "OPERATOR"
      ? this.runOperator(this.current.op)
      : NONE;
  }

  private runOperator(op: Operator): Transition {
    const buf = this.buffer;
    switch (op) {
      case "y":
        this.yank(buf.copy());
        return to(NORMAL);
      case "d":
        this.yank(buf.cut());
        return to(NORMAL);
      case "c":
        this.yank(buf.cut());
        return to(INSERT);
    }
  }

  private yank(text: string | null) {
    if (text) copyToClipboard(this.clipboard, text);
  }
}
