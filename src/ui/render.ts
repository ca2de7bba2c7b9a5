import type { Cursor } from "../editor/state.js";
import type { TextBuffer } from "../editor/buffer.js";
import { followCursor } from "../editor/viewport.js";
import type { ResultGridModel } from "../grid/result-grid.js";
import { displayWidth, fitToWidth } from "../grid/width.js";

export const GUTTER_WIDTH = 6;

/** Escape text for a tags-enabled blessed box. */
export function escapeTags(text: string): string {
  return text.replace(/[{}]/g, (c) => (c === "{" ? "{open}" : "{close}"));
}

function before(a: Cursor, b: Cursor): boolean {
  return a.row < b.row || (a.row === b.row && a.col < b.col);
}

export type EditorView = {
  width: number;
  height: number;
  scrollTop: number;
  showCursor: boolean;
};

/**
 * Editor lines with a relative line-number gutter: the cursor line shows its
 * absolute number, every other line its distance from the cursor.
 */
export function renderEditor(buf: TextBuffer, view: EditorView): string[] {
  const cursor = buf.cursor;
  const range = buf.selectionRange();
  const textWidth = Math.max(0, view.width - GUTTER_WIDTH);
  const out: string[] = [];

  for (let i = 0; i < view.height; i++) {
    const row = view.scrollTop + i;
    if (row >= buf.lineCount()) {
      out.push("~");
      continue;
    }
    const rel = row === cursor.row ? row + 1 : Math.abs(row - cursor.row);
    const gutter = String(rel).padStart(GUTTER_WIDTH - 1, " ") + " ";

    let line = "";
    let used = 0;
    let col = 0;
    for (const ch of [...buf.lineAt(row), " "]) {
      const w = displayWidth(ch);
      if (used + w > textWidth) break;
      const pos = { row, col };
      const selected =
        range !== null && !before(pos, range[0]) && before(pos, range[1]);
      const atCursor =
        view.showCursor && row === cursor.row && col === cursor.col;
      const isPad = col === buf.lineLength(row);
      if (isPad && !atCursor && !selected) break;
      const cell = escapeTags(ch);
      line += atCursor || selected ? `{inverse}${cell}{/inverse}` : cell;
      used += w;
      col++;
    }
    out.push(gutter + line);
  }
  return out;
}

/** Header, rows of the current page and a footer, each padded to `width`. */
export function renderGrid(
  grid: ResultGridModel,
  width: number,
  height: number,
): string[] {
  if (grid.isEmpty()) {
    return grid.columnCount > 0
      ? [renderHeader(grid, width), "(no rows)"]
      : ["No results. Press F5 to run the query."];
  }

  const bodyHeight = Math.max(0, height - 2);
  const rows = grid.pageRows();
  const { start } = grid.pageBounds();
  const top = followCursor(0, grid.scrollPosition, bodyHeight);

  const out = [renderHeader(grid, width)];
  for (let i = top; i < Math.min(rows.length, top + bodyHeight); i++) {
    out.push(renderRow(grid, rows[i] ?? [], start + i, width));
  }
  out.push(renderFooter(grid));
  return out;
}

function renderHeader(grid: ResultGridModel, width: number): string {
  const cells = grid.visibleColumns().map((c, i) => {
    const text = escapeTags(fitToWidth(c.header, c.width));
    return i === grid.selectedColumn
      ? `{underline}{bold}${text}{/bold}{/underline}`
      : `{bold}${text}{/bold}`;
  });
  return clip(
    cells,
    grid.visibleColumns().map((c) => c.width),
    width,
  );
}

function renderRow(
  grid: ResultGridModel,
  cells: readonly string[],
  absolute: number,
  width: number,
): string {
  const columns = grid.visibleColumns();
  const isSelectedRow = absolute === grid.selectedRow;
  const parts = columns.map((c, i) => {
    const raw =
      c.dataIndex === null ? String(absolute + 1) : (cells[c.dataIndex] ?? "");
    const text = escapeTags(fitToWidth(raw.replace(/\s+/g, " "), c.width));
    if (isSelectedRow && i === grid.selectedColumn) {
      return `{inverse}{bold}${text}{/bold}{/inverse}`;
    }
    if (isSelectedRow) return `{inverse}${text}{/inverse}`;
    return text;
  });
  return clip(
    parts,
    columns.map((c) => c.width),
    width,
  );
}

/** Join rendered cells, dropping the ones that start past `width`. */
function clip(parts: string[], widths: number[], width: number): string {
  let used = 0;
  const kept: string[] = [];
  parts.forEach((p, i) => {
    if (used >= width) return;
    kept.push(p);
    used += widths[i] ?? 0;
  });
  return kept.join("");
}

export function renderFooter(grid: ResultGridModel): string {
  const row = grid.selectedRow === null ? "-" : String(grid.selectedRow + 1);
  const pages = Math.max(1, grid.totalPages());
  return (
    `Page ${grid.currentPage + 1}/${pages}  ` +
    `Row ${row}/${grid.rowCount}  Columns ${grid.columnCount}`
  );
}

export function renderTabs(titles: readonly string[], active: number): string {
  return titles
    .map((t, i) =>
      i === active
        ? `{bold}{underline}${escapeTags(t)}{/underline}{/bold}`
        : escapeTags(t),
    )
    .join(" │ ");
}
