import type { RowStringifier } from "../stringify.js";

export type DriverName = "sqlite" | "postgres" | "mysql";

/**
 * Column names in result order plus positional raw rows, so repeated names
 * survive.
 */
export interface RawResult {
  columns: string[];
  rows: unknown[][];
}

export interface DatabaseDriver {
  readonly driverName: DriverName;

  /** Cell formatting for this backend's value types. */
  readonly stringifier: RowStringifier;

  /** Connect to the database. Throws with an actionable message on failure. */
  connect(): Promise<void>;

  /** Run a row-returning statement. */
  fetch(sql: string): Promise<RawResult>;

  /** Run a statement and return the number of affected rows. */
  run(sql: string): Promise<number>;

  /** Test if the connection is alive. */
  ping(): Promise<boolean>;

  close(): Promise<void>;
}
