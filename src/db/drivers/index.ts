import type { ConnectionConfig } from "../../config.js";
import { ConfigError } from "../../errors.js";
import type { DatabaseDriver } from "./base.js";
import { SqliteDriver } from "./sqlite.js";

export type { DatabaseDriver, DriverName, RawResult } from "./base.js";

/** Build the driver for a connection. Network drivers load on first use. */
export async function createDriver(
  connCfg: ConnectionConfig,
  timeoutMs: number,
): Promise<DatabaseDriver> {
  switch (connCfg.driver) {
    case "sqlite":
      return new SqliteDriver(connCfg.path ?? ":memory:", timeoutMs);
    case "postgres": {
      const { PostgresDriver } = await import("./postgres.js");
      return new PostgresDriver(requireConnectionString(connCfg), timeoutMs);
    }
    case "mysql": {
      const { MysqlDriver } = await import("./mysql.js");
      return new MysqlDriver(requireConnectionString(connCfg), timeoutMs);
    }
  }
}

function requireConnectionString(connCfg: ConnectionConfig): string {
  if (!connCfg.connectionString) {
    throw new ConfigError(
      `A ${connCfg.driver} connection needs a connectionString.`,
    );
  }
  return connCfg.connectionString;
}
