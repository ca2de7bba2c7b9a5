import { describe, expect, it } from "vitest";
import { QueryStatsStore } from "./stats.js";

describe("QueryStatsStore", () => {
  it("starts empty", () => {
    expect(new QueryStatsStore().latest()).toBeNull();
  });

  it("replaces the snapshot on each update", () => {
    const store = new QueryStatsStore();
    const first = store.update(10, 4);
    const second = store.update(2, 9);

    expect(store.latest()).toBe(second);
    expect(first).toMatchObject({ rows: 10, elapsedMs: 4 });
    expect(second).toMatchObject({ rows: 2, elapsedMs: 9 });
    expect(Object.isFrozen(second)).toBe(true);
    expect(second.finishedAt).toBeInstanceOf(Date);
  });

  it("clears on reset", () => {
    const store = new QueryStatsStore();
    store.update(1, 1);
    store.reset();
    expect(store.latest()).toBeNull();
  });
});
