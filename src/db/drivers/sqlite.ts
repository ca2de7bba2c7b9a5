import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import type { DatabaseDriver, RawResult } from "./base.js";
import { SqliteStringifier } from "../stringify.js";
import { resolvePath } from "../../config.js";
import { QueryError, errorMessage } from "../../errors.js";

const MEMORY = ":memory:";

export class SqliteDriver implements DatabaseDriver {
  readonly driverName = "sqlite";
  readonly stringifier = new SqliteStringifier();
  private db: Database.Database | null = null;
  private dbPath: string;
  private timeoutMs: number;

  constructor(path: string, timeoutMs: number) {
    this.dbPath = path === MEMORY ? MEMORY : resolvePath(path);
    this.timeoutMs = timeoutMs;
  }

  async connect(): Promise<void> {
    if (this.dbPath !== MEMORY) {
      mkdirSync(dirname(this.dbPath), { recursive: true });
    }
    try {
      // better-sqlite3 is synchronous; the timeout only bounds waiting on a
      // locked database.
      this.db = new Database(this.dbPath, {
        timeout: this.timeoutMs > 0 ? this.timeoutMs : undefined,
      });
    } catch (e) {
      throw new QueryError(
        `Failed to open SQLite database at ${this.dbPath}: ${errorMessage(e)}`,
        "CONNECTION",
        { cause: e },
      );
    }
  }

  async fetch(sql: string): Promise<RawResult> {
    const db = this.ensureConnected();
    const stmt = db.prepare(sql);
    if (!stmt.reader) {
      stmt.run();
      return { columns: [], rows: [] };
    }
    const columns = stmt.columns().map((c) => c.name);
    const rows: unknown[][] = stmt
      .raw(true)
      .all()
      .map((row): unknown[] => (Array.isArray(row) ? row : [row]));
    return { columns, rows };
  }

  async run(sql: string): Promise<number> {
    const db = this.ensureConnected();
    return db.prepare(sql).run().changes;
  }

  async ping(): Promise<boolean> {
    try {
      this.ensureConnected().prepare("SELECT 1").get();
      return true;
    } catch {
      return false;
    }
  }

  async close(): Promise<void> {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  private ensureConnected(): Database.Database {
    if (!this.db) {
      throw new QueryError(
        "SQLite database not connected. Call connect() first.",
        "NOT_CONNECTED",
      );
    }
    return this.db;
  }
}
