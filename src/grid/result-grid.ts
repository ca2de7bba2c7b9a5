import { copyToClipboard, type Clipboard } from "../clipboard.js";
import { log } from "../logger.js";
import { exportRow } from "./row-export.js";
import { displayWidth } from "./width.js";

export const DEFAULT_PAGE_SIZE = 100;
export const COLUMN_PADDING = 2;
export const MIN_COLUMN_WIDTH = 4;

/** Index 0 of the visible columns is the row-number column. */
export const ROW_NUMBER_COLUMN = 0;

export type PageBounds = { start: number; end: number };

export type VisibleColumn = {
  header: string;
  width: number;
  /** Index into the result's columns, or null for the row-number column. */
  dataIndex: number | null;
};

export function minimumColumnWidths(
  headers: string[],
  rows: string[][],
): number[] {
  const widths = headers.map((h) => displayWidth(h));
  for (const row of rows) {
    row.forEach((cell, i) => {
      const current = widths[i];
      if (current === undefined) return;
      const w = displayWidth(cell);
      if (w > current) widths[i] = w;
    });
  }
  return widths.map((w) => Math.max(w + COLUMN_PADDING, MIN_COLUMN_WIDTH));
}

/**
 * A fetched result set and the state of its viewport.
 *
 * Rows are shown one page at a time. The selected row is always an absolute
 * index inside the current page; row navigation wraps within the page and
 * never changes it. The selected column indexes the *visible* columns: the
 * row-number column first, then the data columns starting at the horizontal
 * offset.
 */
export class ResultGridModel {
  readonly pageSize: number;

  private headerList: string[] = [];
  private data: string[][] = [];
  private widths: number[] = [];
  private minWidths: number[] = [];

  private row: number | null = null;
  private column: number | null = null;
  private page = 0;
  private scroll = 0;
  private hOffset = 0;

  private readonly clipboard: Clipboard;

  constructor(clipboard: Clipboard, pageSize = DEFAULT_PAGE_SIZE) {
    if (!Number.isInteger(pageSize) || pageSize < 1) {
      throw new RangeError(
        `page size must be a positive integer, got ${pageSize}`,
      );
    }
    this.clipboard = clipboard;
    this.pageSize = pageSize;
  }

  replace(headers: string[], rows: string[][]) {
    this.headerList = [...headers];
    this.data = rows;
    this.minWidths = minimumColumnWidths(this.headerList, rows);
    this.widths = [...this.minWidths];
    this.page = 0;
    this.scroll = 0;
    this.hOffset = 0;
    this.column = null;
    this.row = rows.length > 0 ? 0 : null;
  }

  // ── Accessors ───────────────────────────────────────────────────────

  get headers(): readonly string[] {
    return this.headerList;
  }

  get rowCount() {
    return this.data.length;
  }

  get columnCount() {
    return this.headerList.length;
  }

  get currentPage() {
    return this.page;
  }

  get selectedRow(): number | null {
    return this.row;
  }

  get selectedColumn(): number | null {
    return this.column;
  }

  /** Selected row relative to the start of the current page. */
  get rowOnPage(): number | null {
    return this.row === null ? null : this.row - this.page * this.pageSize;
  }

  /** Vertical scroll position within the page, in rows. */
  get scrollPosition() {
    return this.scroll;
  }

  get horizontalOffset() {
    return this.hOffset;
  }

  isEmpty() {
    return this.data.length === 0;
  }

  totalPages() {
    return Math.ceil(this.data.length / this.pageSize);
  }

  pageBounds(): PageBounds {
    const start = this.page * this.pageSize;
    return { start, end: Math.min(start + this.pageSize, this.data.length) };
  }

  pageRows(): readonly string[][] {
    const { start, end } = this.pageBounds();
    return this.data.slice(start, end);
  }

  columnWidths(): readonly number[] {
    return this.widths;
  }

  minColumnWidths(): readonly number[] {
    return this.minWidths;
  }

  /** Width of the row-number column for the current result. */
  rowNumberWidth() {
    return Math.max(
      String(this.data.length).length + COLUMN_PADDING,
      MIN_COLUMN_WIDTH,
    );
  }

  visibleColumns(): VisibleColumn[] {
    const cols: VisibleColumn[] = [
      { header: "#", width: this.rowNumberWidth(), dataIndex: null },
    ];
    for (let i = this.hOffset; i < this.headerList.length; i++) {
      cols.push({
        header: this.headerList[i] ?? "",
        width: this.widths[i] ?? MIN_COLUMN_WIDTH,
        dataIndex: i,
      });
    }
    return cols;
  }

  // ── Rows and pages ──────────────────────────────────────────────────

  nextRow() {
    if (this.isEmpty()) return;
    const { start, end } = this.pageBounds();
    const current = this.rowInPage(start, end);
    this.selectRow(current + 1 >= end ? start : current + 1);
  }

  previousRow() {
    if (this.isEmpty()) return;
    const { start, end } = this.pageBounds();
    const current = this.rowInPage(start, end);
    this.selectRow(current <= start ? end - 1 : current - 1);
  }

  nextPage() {
    this.goToPage(this.page + 1);
  }

  previousPage() {
    this.goToPage(this.page - 1);
  }

  jumpToAbsoluteRow(n: number) {
    if (this.isEmpty() || !Number.isFinite(n)) return;
    const target = Math.max(0, Math.min(Math.trunc(n), this.data.length - 1));
    this.page = Math.floor(target / this.pageSize);
    this.selectRow(target);
  }

  private goToPage(page: number) {
    if (this.isEmpty()) return;
    this.page = Math.max(0, Math.min(page, this.totalPages() - 1));
    this.selectRow(this.page * this.pageSize);
  }

  private rowInPage(start: number, end: number): number {
    return this.row !== null && this.row >= start && this.row < end
      ? this.row
      : start;
  }

  private selectRow(absolute: number) {
    this.row = absolute;
    this.scroll = absolute - this.page * this.pageSize;
  }

  // ── Columns ─────────────────────────────────────────────────────────

  private visibleColumnCount() {
    return 1 + this.headerList.length - this.hOffset;
  }

  nextColumn() {
    if (this.isEmpty()) return;
    const last = this.visibleColumnCount() - 1;
    this.column = this.column === null ? 0 : Math.min(this.column + 1, last);
  }

  previousColumn() {
    if (this.isEmpty()) return;
    this.column = this.column === null ? 0 : Math.max(this.column - 1, 0);
  }

  scrollRight() {
    if (this.isEmpty() || this.headerList.length === 0) return;
    this.hOffset = Math.min(this.hOffset + 1, this.headerList.length - 1);
    this.clampColumn();
  }

  scrollLeft() {
    if (this.isEmpty()) return;
    this.hOffset = Math.max(this.hOffset - 1, 0);
    this.clampColumn();
  }

  private clampColumn() {
    if (this.column !== null) {
      this.column = Math.min(this.column, this.visibleColumnCount() - 1);
    }
  }

  /** Result column under the selection; null for none or row numbers. */
  selectedDataColumn(): number | null {
    if (this.column === null || this.column === ROW_NUMBER_COLUMN) return null;
    const index = this.hOffset + this.column - 1;
    return index < this.headerList.length ? index : null;
  }

  adjustColumnWidth(delta: number) {
    const index = this.selectedDataColumn();
    if (index === null || !Number.isFinite(delta)) return;
    const min = this.minWidths[index] ?? MIN_COLUMN_WIDTH;
    const current = this.widths[index] ?? min;
    this.widths[index] = Math.max(min, current + Math.trunc(delta));
  }

  // ── Export ──────────────────────────────────────────────────────────

  copySelectedCell(): string | null {
    if (this.row === null || this.column === null) return null;
    const cells = this.data[this.row];
    if (!cells) return null;

    let text: string | null;
    if (this.column === ROW_NUMBER_COLUMN) {
      text = String(this.row + 1);
    } else {
      const index = this.selectedDataColumn();
      text = index === null ? null : cells[index] ?? null;
    }
    if (text === null) return null;

    copyToClipboard(this.clipboard, text);
    return text;
  }

  copySelectedRow(): string | null {
    if (this.row === null) return null;
    const cells = this.data[this.row];
    if (!cells) return null;

    const result = exportRow(this.headerList, cells);
    if (!result.ok) {
      log.error(`row ${this.row + 1} not copied: ${result.reason}`);
      return null;
    }
    copyToClipboard(this.clipboard, result.text);
    return result.text;
  }
}
