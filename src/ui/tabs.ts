export const RESULT_TABS = ["Data", "Messages"] as const;

export type ResultTab = (typeof RESULT_TABS)[number];

/** Tab strip of the result pane. Next and previous cycle. */
export class TabStrip<T extends string> {
  readonly titles: readonly [T, ...T[]];
  private current = 0;

  constructor(titles: readonly [T, ...T[]], initial = 0) {
    this.titles = titles;
    this.current = Math.max(0, Math.min(initial, titles.length - 1));
  }

  get index() {
    return this.current;
  }

  get active(): T {
    return this.titles[this.current] ?? this.titles[0];
  }

  next() {
    this.current = (this.current + 1) % this.titles.length;
  }

  previous() {
    this.current = this.current > 0 ? this.current - 1 : this.titles.length - 1;
  }

  /** Out-of-range indexes are ignored. */
  setIndex(index: number) {
    if (Number.isInteger(index) && index >= 0 && index < this.titles.length) {
      this.current = index;
    }
  }
}
