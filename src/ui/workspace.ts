import type { Clipboard } from "../clipboard.js";
import type { DatabaseSession } from "../db/session.js";
import { ModalEditor } from "../editor/modal-editor.js";
import type { KeyInput } from "../editor/state.js";
import { errorMessage } from "../errors.js";
import { ResultGridModel } from "../grid/result-grid.js";
import { log } from "../logger.js";
import {
  digitTab,
  globalBindings,
  gridBindings,
  lookup,
  type CommandId,
} from "./keymap.js";
import { RESULT_TABS, TabStrip } from "./tabs.js";

export type Focus = "editor" | "grid";

export type WorkspaceHooks = {
  /** A query finished and the workspace changed outside a key press. */
  onUpdate?: () => void;
  onQuit?: () => void;
};

/**
 * Editor, result grid and tabs of one session, and the routing of key
 * presses between them. Knows nothing about the terminal.
 *
 * At most one query runs at a time. While it runs the editor and the grid
 * are left alone: every key except quit is ignored, and the only change the
 * query makes when it settles is one `replace` of the grid.
 */
export class Workspace {
  readonly editor: ModalEditor;
  readonly grid: ResultGridModel;
  readonly tabs = new TabStrip(RESULT_TABS);
  focus: Focus = "editor";
  /** Text of the Messages tab. */
  messages = "";
  statusMessage = "";
  closed = false;

  private readonly session: DatabaseSession;
  private readonly hooks: WorkspaceHooks;
  private inFlight: Promise<void> | null = null;
  private readonly commands: Record<CommandId, () => void>;

  constructor(
    session: DatabaseSession,
    clipboard: Clipboard,
    pageSize: number,
    hooks: WorkspaceHooks = {},
    initialText = "",
  ) {
    this.session = session;
    this.hooks = hooks;
    this.editor = new ModalEditor(clipboard, initialText);
    this.grid = new ResultGridModel(clipboard, pageSize);

    const grid = this.grid;
    this.commands = {
      "query.run": () => {
        void this.runQuery();
      },
      "focus.toggle": () => {
        this.focus = this.focus === "editor" ? "grid" : "editor";
      },
      quit: () => this.quit(),
      "grid.row.next": () => grid.nextRow(),
      "grid.row.previous": () => grid.previousRow(),
      "grid.column.next": () => grid.nextColumn(),
      "grid.column.previous": () => grid.previousColumn(),
      "grid.scroll.right": () => grid.scrollRight(),
      "grid.scroll.left": () => grid.scrollLeft(),
      "grid.page.next": () => grid.nextPage(),
      "grid.page.previous": () => grid.previousPage(),
      "grid.row.first": () => grid.jumpToAbsoluteRow(0),
      "grid.row.last": () => grid.jumpToAbsoluteRow(grid.rowCount - 1),
      "grid.width.grow": () => grid.adjustColumnWidth(1),
      "grid.width.shrink": () => grid.adjustColumnWidth(-1),
      "grid.copy.cell": () => {
        const text = grid.copySelectedCell();
        if (text !== null) this.statusMessage = `Copied: ${text}`;
      },
      "grid.copy.row": () => {
        const text = grid.copySelectedRow();
        this.statusMessage =
          text === null ? "Row not copied, see log." : `Copied row: ${text}`;
      },
      "tab.next": () => this.tabs.next(),
      "tab.previous": () => this.tabs.previous(),
    };
  }

  get running(): boolean {
    return this.inFlight !== null;
  }

  handleKey(input: KeyInput) {
    if (!input.key || this.closed) return;

    const global = lookup(globalBindings, input);
    if (this.running) {
      if (global === "quit") this.quit();
      return;
    }

    const editorTakesTab =
      this.focus === "editor" && this.editor.mode.kind === "INSERT";
    if (global && !(global === "focus.toggle" && editorTakesTab)) {
      this.commands[global]();
    } else if (this.focus === "editor") {
      const transition = this.editor.handleKey(input);
      if (transition.kind === "mode") this.statusMessage = "";
    } else {
      this.gridKey(input);
    }
  }

  /**
   * Run the editor text. Returns the settled run, or null when nothing was
   * started because the editor is empty or a query is already running.
   */
  runQuery(): Promise<void> | null {
    if (this.inFlight) return null;
    const sql = this.editor.currentText().trim();
    if (!sql) {
      this.statusMessage = "Nothing to run.";
      return null;
    }
    this.statusMessage = "";
    const run = this.execute(sql).finally(() => {
      this.inFlight = null;
      this.hooks.onUpdate?.();
    });
    this.inFlight = run;
    return run;
  }

  quit() {
    if (this.closed) return;
    this.closed = true;
    this.hooks.onQuit?.();
  }

  private async execute(sql: string) {
    try {
      const outcome = await this.session.execute(sql);
      this.messages = outcome.message;
      if (outcome.kind === "rows") {
        this.grid.replace(outcome.headers, outcome.rows);
        this.tabs.setIndex(0);
      } else {
        this.tabs.setIndex(1);
      }
      log.info(outcome.message.replace(/\n/g, " "));
    } catch (e) {
      const msg = errorMessage(e);
      log.error("query failed:", msg);
      this.messages = `Error: ${msg}`;
      this.tabs.setIndex(1);
    }
  }

  private gridKey(input: KeyInput) {
    const tab = digitTab(input);
    if (tab !== null) {
      this.tabs.setIndex(tab);
      return;
    }
    const id = lookup(gridBindings, input);
    if (id) this.commands[id]();
  }
}
