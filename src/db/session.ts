import { QueryError, errorMessage } from "../errors.js";
import { log } from "../logger.js";
import type { QueryStatsStore } from "../stats.js";
import type { DatabaseDriver, DriverName } from "./drivers/index.js";
import { classifySql } from "./query-type.js";
import { monotonic, timeQuery, type Clock } from "./timer.js";

export type AffectingStatement = "INSERT" | "UPDATE" | "DELETE";

export type QueryOutcome =
  | {
      kind: "rows";
      headers: string[];
      rows: string[][];
      rowCount: number;
      elapsedMs: number;
      message: string;
    }
  | {
      kind: "affected";
      statement: AffectingStatement;
      rowCount: number;
      elapsedMs: number;
      message: string;
    };

export interface DatabaseSession {
  readonly driverName: DriverName;
  execute(sql: string): Promise<QueryOutcome>;
  close(): Promise<void>;
}

export function fetchedMessage(rows: number, elapsedMs: number): string {
  return (
    `Successfully run. Total query runtime: ${elapsedMs} ms.\n` +
    `${rows} rows fetched.`
  );
}

export function affectedMessage(
  statement: AffectingStatement,
  rows: number,
  elapsedMs: number,
): string {
  return (
    `${statement} ${rows} rows affected.\n` +
    `Query completed in ${elapsedMs} msec.`
  );
}

/**
 * Runs editor text against one connected driver and records the stats of
 * each run.
 */
export class DriverSession implements DatabaseSession {
  private readonly driver: DatabaseDriver;
  private readonly stats: QueryStatsStore;
  private readonly now: Clock;

  constructor(
    driver: DatabaseDriver,
    stats: QueryStatsStore,
    now: Clock = monotonic,
  ) {
    this.driver = driver;
    this.stats = stats;
    this.now = now;
  }

  get driverName(): DriverName {
    return this.driver.driverName;
  }

  async execute(sql: string): Promise<QueryOutcome> {
    const type = classifySql(sql);
    log.debug(`execute ${type} on ${this.driver.driverName}`);

    switch (type) {
      case "SELECT":
        return this.fetchRows(sql);
      case "INSERT":
      case "UPDATE":
      case "DELETE":
        return this.runAffecting(sql, type);
      case "UNKNOWN":
        throw new QueryError("Unsupported query", "UNSUPPORTED_QUERY");
    }
  }

  close(): Promise<void> {
    return this.driver.close();
  }

  private async fetchRows(sql: string): Promise<QueryOutcome> {
    const [result, elapsedMs] = await this.attempt(() =>
      this.driver.fetch(sql),
    );
    const { stringifier } = this.driver;
    const rows = result.rows.map((r) => stringifier.stringifyRow(r));
    this.stats.update(rows.length, elapsedMs);
    return {
      kind: "rows",
      headers: result.columns,
      rows,
      rowCount: rows.length,
      elapsedMs,
      message: fetchedMessage(rows.length, elapsedMs),
    };
  }

  private async runAffecting(
    sql: string,
    statement: AffectingStatement,
  ): Promise<QueryOutcome> {
    const [rowCount, elapsedMs] = await this.attempt(() =>
      this.driver.run(sql),
    );
    this.stats.update(rowCount, elapsedMs);
    return {
      kind: "affected",
      statement,
      rowCount,
      elapsedMs,
      message: affectedMessage(statement, rowCount, elapsedMs),
    };
  }

  private async attempt<T>(work: () => Promise<T>): Promise<[T, number]> {
    try {
      return await timeQuery(work, this.now);
    } catch (e) {
      if (e instanceof QueryError) throw e;
      throw new QueryError(errorMessage(e), "EXECUTION", { cause: e });
    }
  }
}
