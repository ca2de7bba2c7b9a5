import pg from "pg";
import type { Pool } from "pg";
import type { DatabaseDriver, RawResult } from "./base.js";
import { PostgresStringifier } from "../stringify.js";
import { expandEnv } from "../../config.js";
import { QueryError, errorMessage } from "../../errors.js";

export class PostgresDriver implements DatabaseDriver {
  readonly driverName = "postgres";
  readonly stringifier = new PostgresStringifier();
  private pool: Pool | null = null;
  private connString: string;
  private timeoutMs: number;

  constructor(connectionString: string, timeoutMs: number) {
    this.connString = connectionString;
    this.timeoutMs = timeoutMs;
  }

  async connect(): Promise<void> {
    const resolved = expandEnv(this.connString);
    const pool = new pg.Pool({
      connectionString: resolved,
      max: 3,
      statement_timeout: this.timeoutMs > 0 ? this.timeoutMs : undefined,
    });

    // Test the connection
    try {
      const client = await pool.connect();
      client.release();
    } catch (e) {
      await pool.end().catch(() => undefined);
      const msg = errorMessage(e);
      if (msg.includes("ECONNREFUSED")) {
        throw new QueryError(
          "Cannot connect to PostgreSQL: connection refused. " +
            "Is the server running? Check host/port in your connection string.",
          "CONNECTION",
          { cause: e },
        );
      }
      if (msg.includes("password authentication failed")) {
        throw new QueryError(
          "PostgreSQL authentication failed: wrong password. " +
            "Check your connection string credentials.",
          "CONNECTION",
          { cause: e },
        );
      }
      if (msg.includes("does not exist")) {
        throw new QueryError(
          `PostgreSQL database not found. ${msg}`,
          "CONNECTION",
          { cause: e },
        );
      }
      throw new QueryError(
        `PostgreSQL connection failed: ${msg}`,
        "CONNECTION",
        { cause: e },
      );
    }
    this.pool = pool;
  }

  async fetch(sql: string): Promise<RawResult> {
    const pool = this.ensureConnected();
    const result = await pool.query<unknown[]>({ text: sql, rowMode: "array" });
    return {
      columns: result.fields.map((f) => f.name),
      rows: result.rows,
    };
  }

  async run(sql: string): Promise<number> {
    const pool = this.ensureConnected();
    const result = await pool.query(sql);
    return result.rowCount ?? 0;
  }

  async ping(): Promise<boolean> {
    try {
      await this.ensureConnected().query("SELECT 1");
      return true;
    } catch {
      return false;
    }
  }

  async close(): Promise<void> {
    if (this.pool) {
      await this.pool.end();
      this.pool = null;
    }
  }

  private ensureConnected(): Pool {
    if (!this.pool) {
      throw new QueryError(
        "PostgreSQL not connected. Call connect() first.",
        "NOT_CONNECTED",
      );
    }
    return this.pool;
  }
}
