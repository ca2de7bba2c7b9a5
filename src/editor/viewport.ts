/** Smallest change to `top` that keeps `row` inside `height` visible lines. */
export function followCursor(
  top: number,
  row: number,
  height: number,
): number {
  let next = top;
  if (row < next) next = row;
  if (height > 0 && row >= next + height) next = row - height + 1;
  return Math.max(0, next);
}

/** Lines moved by each ctrl scroll key, for a view `height` lines tall. */
export const SCROLL_KEYS: Record<string, (height: number) => number> = {
  e: () => 1,
  y: () => -1,
  d: (height) => Math.max(1, Math.floor(height / 2)),
  u: (height) => -Math.max(1, Math.floor(height / 2)),
  f: (height) => Math.max(1, height),
  b: (height) => -Math.max(1, height),
};
