import blessed from "neo-blessed";

import type { Clipboard } from "../clipboard.js";
import type { DatabaseSession } from "../db/session.js";
import { fromBlessedKey, type BlessedKey } from "../editor/keys.js";
import { modeHelp, modeLabel } from "../editor/state.js";
import type { QueryStatsStore } from "../stats.js";
import {
  escapeTags,
  renderEditor,
  renderGrid,
  renderTabs,
} from "./render.js";
import { Workspace } from "./workspace.js";

export type WorkspaceOptions = {
  session: DatabaseSession;
  stats: QueryStatsStore;
  clipboard: Clipboard;
  pageSize: number;
  /** Connection shown in the status line. */
  target: string;
  initialText?: string;
};

const SPINNER = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"];
const SPINNER_INTERVAL_MS = 100;

function size(v: number | string): number {
  return typeof v === "number" ? v : Number.parseInt(v, 10) || 0;
}

/**
 * Take over the terminal with the query workspace. Resolves once the user
 * quits and the screen has been released.
 */
export function startWorkspace(opts: WorkspaceOptions): Promise<void> {
  const { session, stats } = opts;

  const screen = blessed.screen({
    smartCSR: true,
    title: "querydeck",
    fullUnicode: true,
  });

  const editorBox = blessed.box({
    top: 0,
    left: 0,
    width: "100%",
    height: "40%",
    border: "line",
    label: " Query ",
    tags: true,
  });
  const tabsBar = blessed.box({
    top: "40%",
    left: 0,
    width: "100%",
    height: 1,
    tags: true,
  });
  const resultBox = blessed.box({
    top: "40%+1",
    left: 0,
    width: "100%",
    height: "60%-2",
    border: "line",
    tags: true,
  });
  const status = blessed.box({
    bottom: 0,
    left: 0,
    width: "100%",
    height: 1,
    tags: true,
  });
  screen.append(editorBox);
  screen.append(tabsBar);
  screen.append(resultBox);
  screen.append(status);

  let finish: () => void = () => {};
  const done = new Promise<void>((resolve) => {
    finish = resolve;
  });

  let frame = 0;
  let spinner: NodeJS.Timeout | null = null;

  function stopSpinner() {
    if (spinner) clearInterval(spinner);
    spinner = null;
  }

  const ws = new Workspace(
    session,
    opts.clipboard,
    opts.pageSize,
    {
      onUpdate: () => {
        stopSpinner();
        render();
      },
      onQuit: () => {
        stopSpinner();
        screen.destroy();
        finish();
      },
    },
    opts.initialText,
  );
  const { editor, grid, tabs } = ws;

  function render() {
    if (ws.closed) return;
    const innerWidth = Math.max(0, size(editorBox.width) - 2);
    editor.setViewHeight(Math.max(0, size(editorBox.height) - 2));
    editorBox.setContent(
      renderEditor(editor.buffer, {
        width: innerWidth,
        height: editor.viewHeight,
        scrollTop: editor.scrollTop,
        showCursor: ws.focus === "editor",
      }).join("\n"),
    );
    editorBox.setLabel(ws.focus === "editor" ? " Query * " : " Query ");
    resultBox.setLabel(ws.focus === "grid" ? " Results * " : " Results ");

    tabsBar.setContent(" " + renderTabs(tabs.titles, tabs.index));
    if (tabs.active === "Data") {
      const w = Math.max(0, size(resultBox.width) - 2);
      const h = Math.max(0, size(resultBox.height) - 2);
      resultBox.setContent(renderGrid(grid, w, h).join("\n"));
    } else {
      resultBox.setContent(escapeTags(ws.messages));
    }

    status.setContent(escapeTags(statusLine()));
    screen.render();
  }

  function statusLine(): string {
    const focus = ws.focus === "editor" ? modeLabel(editor.mode) : "GRID";
    const activity = ws.running
      ? `${SPINNER[frame] ?? ""} running`
      : lastRun();
    const help =
      ws.focus === "editor"
        ? modeHelp(editor.mode)
        : "F5 run, Tab editor, q quit";
    const hint = ws.statusMessage || help;
    const where = `${session.driverName}:${opts.target}`;
    return ` ${focus}  ${where}  ${activity}  ${hint}`;
  }

  function lastRun(): string {
    const last = stats.latest();
    return last ? `${last.rows} rows in ${last.elapsedMs} ms` : "idle";
  }

  screen.on(
    "keypress",
    (ch: string | undefined, key: BlessedKey | undefined) => {
      ws.handleKey(fromBlessedKey(ch, key));
      if (ws.running && !spinner) {
        spinner = setInterval(() => {
          frame = (frame + 1) % SPINNER.length;
          render();
        }, SPINNER_INTERVAL_MS);
      }
      render();
    },
  );

  screen.on("resize", () => render());

  render();
  return done;
}
