import mysql from "mysql2/promise";
import type { Pool, ResultSetHeader, RowDataPacket } from "mysql2/promise";
import type { DatabaseDriver, RawResult } from "./base.js";
import { MysqlStringifier } from "../stringify.js";
import { expandEnv } from "../../config.js";
import { QueryError, errorMessage } from "../../errors.js";

export class MysqlDriver implements DatabaseDriver {
  readonly driverName = "mysql";
  readonly stringifier = new MysqlStringifier();
  private pool: Pool | null = null;
  private connString: string;
  private timeoutMs: number;

  constructor(connectionString: string, timeoutMs: number) {
    this.connString = connectionString;
    this.timeoutMs = timeoutMs;
  }

  async connect(): Promise<void> {
    const resolved = expandEnv(this.connString);
    const pool = mysql.createPool({ uri: resolved, connectionLimit: 3 });

    // Test the connection
    try {
      const conn = await pool.getConnection();
      conn.release();
    } catch (e) {
      await pool.end().catch(() => undefined);
      const msg = errorMessage(e);
      if (msg.includes("ECONNREFUSED")) {
        throw new QueryError(
          "Cannot connect to MySQL: connection refused. " +
            "Is the server running? Check host/port.",
          "CONNECTION",
          { cause: e },
        );
      }
      if (msg.includes("Access denied")) {
        throw new QueryError(
          "MySQL access denied: wrong username or password. " +
            "Check your connection string credentials.",
          "CONNECTION",
          { cause: e },
        );
      }
      if (msg.includes("Unknown database")) {
        throw new QueryError(`MySQL database not found. ${msg}`, "CONNECTION", {
          cause: e,
        });
      }
      throw new QueryError(`MySQL connection failed: ${msg}`, "CONNECTION", {
        cause: e,
      });
    }
    this.pool = pool;
  }

  async fetch(sql: string): Promise<RawResult> {
    const pool = this.ensureConnected();
    const [rows, fields] = await pool.query<RowDataPacket[][]>({
      sql,
      rowsAsArray: true,
      timeout: this.timeoutMs > 0 ? this.timeoutMs : undefined,
    });
    return {
      columns: fields.map((f) => f.name),
      rows,
    };
  }

  async run(sql: string): Promise<number> {
    const pool = this.ensureConnected();
    const [header] = await pool.query<ResultSetHeader>({
      sql,
      timeout: this.timeoutMs > 0 ? this.timeoutMs : undefined,
    });
    return header.affectedRows;
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
        "MySQL not connected. Call connect() first.",
        "NOT_CONNECTED",
      );
    }
    return this.pool;
  }
}
