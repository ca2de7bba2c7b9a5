export interface QueryStats {
  readonly rows: number;
  readonly elapsedMs: number;
  readonly finishedAt: Date;
}

/**
 * Statistics of the last completed query. One store is created per process
 * and handed to the session that writes it and the UI that reads it.
 *
 * Each update swaps in a new frozen snapshot, so a reader holding the result
 * of `latest()` never observes a half-written value.
 */
export class QueryStatsStore {
  private current: QueryStats | null = null;

  update(rows: number, elapsedMs: number): QueryStats {
    const next: QueryStats = Object.freeze({
      rows,
      elapsedMs,
      finishedAt: new Date(),
    });
    this.current = next;
    return next;
  }

  latest(): QueryStats | null {
    return this.current;
  }

  reset(): void {
    this.current = null;
  }
}
