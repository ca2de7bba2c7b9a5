const NULL_MARKERS = new Set(["null", "<null>", "(null)"]);

export function isNullMarker(cell: string): boolean {
  return NULL_MARKERS.has(cell.trim().toLowerCase());
}

/**
 * Header names as object keys. Result sets may repeat a name
 * (`SELECT a.id, b.id ...`); later occurrences get `_2`, `_3`, ...
 */
export function uniqueKeys(headers: string[]): string[] {
  const seen = new Map<string, number>();
  const taken = new Set(headers);
  return headers.map((h) => {
    const count = (seen.get(h) ?? 0) + 1;
    seen.set(h, count);
    if (count === 1) return h;
    let n = count;
    while (taken.has(`${h}_${n}`)) n++;
    const key = `${h}_${n}`;
    taken.add(key);
    return key;
  });
}

export type RowExport =
  | { ok: true; text: string }
  | { ok: false; reason: string };

/**
 * JSON object text for one row, with null markers encoded as JSON null.
 * Keys keep the column order, including names that look like integers.
 */
export function exportRow(headers: string[], row: string[]): RowExport {
  if (headers.length !== row.length) {
    return {
      ok: false,
      reason:
        `row has ${row.length} cell(s) but the result has ` +
        `${headers.length} column(s)`,
    };
  }
  const members = uniqueKeys(headers).map((key, i) => {
    const cell = row[i] ?? "";
    const value = isNullMarker(cell) ? null : cell;
    return `${JSON.stringify(key)}:${JSON.stringify(value)}`;
  });
  return { ok: true, text: `{${members.join(",")}}` };
}
