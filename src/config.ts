import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { z } from "zod";
import { ConfigError, errorMessage } from "./errors.js";

const connectionSchema = z
  .object({
    driver: z.enum(["sqlite", "postgres", "mysql"]),
    path: z.string().optional(),
    connectionString: z.string().optional(),
  })
  .refine((c) => c.driver === "sqlite" || Boolean(c.connectionString), {
    message: "postgres and mysql connections need a connectionString",
  });

const configSchema = z.object({
  connections: z.record(connectionSchema).default({}),
  defaultConnection: z.string().optional(),
  pageSize: z.number().int().min(1).max(10_000).default(100),
  queryTimeout: z.number().int().min(0).default(30_000),
  clipboard: z.enum(["system", "memory"]).default("system"),
  logFile: z.string().default("~/.querydeck/querydeck.log"),
});

export type ConnectionConfig = z.infer<typeof connectionSchema>;
export type WorkspaceConfig = z.infer<typeof configSchema>;

export const DEFAULT_CONFIG_PATH = "~/.querydeck/config.json";

export function resolveConfig(raw?: unknown): WorkspaceConfig {
  const parsed = configSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (i) => `${i.path.join(".") || "(root)"}: ${i.message}`,
    );
    throw new ConfigError(`Invalid configuration:\n  ${issues.join("\n  ")}`);
  }
  return parsed.data;
}

/**
 * Read and validate a JSON config file. A missing default file means
 * defaults.
 */
export function loadConfigFile(
  file: string = DEFAULT_CONFIG_PATH,
  required = false,
): WorkspaceConfig {
  const resolved = resolvePath(file);
  if (!fs.existsSync(resolved)) {
    if (required) throw new ConfigError(`Config file not found: ${resolved}`);
    return resolveConfig();
  }
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(resolved, "utf8"));
  } catch (e) {
    throw new ConfigError(
      `Config file ${resolved} is not valid JSON: ${errorMessage(e)}`,
      { cause: e },
    );
  }
  return resolveConfig(raw);
}

/**
 * Expand $ENV_VAR references in a string to their process.env values.
 * Throws if the variable is not set.
 */
export function expandEnv(value: string): string {
  return value.replace(/\$([A-Z_][A-Z0-9_]*)/gi, (_match, name: string) => {
    const val = process.env[name];
    if (val === undefined) {
      throw new ConfigError(
        `Environment variable $${name} is not set. Set it before connecting.`,
      );
    }
    return val;
  });
}

/**
 * Resolve a path, expanding ~ to the home directory and $ENV_VAR references.
 */
export function resolvePath(p: string): string {
  let resolved = expandEnv(p);
  if (resolved === "~" || resolved.startsWith("~/")) {
    resolved = path.join(os.homedir(), resolved.slice(1));
  }
  return resolved;
}

export function resolveConnectionName(
  cfg: WorkspaceConfig,
  name?: string,
): string {
  if (name) return name;
  if (cfg.defaultConnection) return cfg.defaultConnection;
  const keys = Object.keys(cfg.connections);
  const only = keys.length === 1 ? keys[0] : undefined;
  if (only !== undefined) return only;
  if (keys.length === 0) {
    throw new ConfigError(
      "No database connections configured. " +
        "Pass --url or add one to the config file.",
    );
  }
  throw new ConfigError(
    `Multiple connections available (${keys.join(", ")}). ` +
      "Specify which one to use.",
  );
}

export function getConnection(
  cfg: WorkspaceConfig,
  name?: string,
): { name: string; connection: ConnectionConfig } {
  const connName = resolveConnectionName(cfg, name);
  const connection = cfg.connections[connName];
  if (!connection) {
    const available = Object.keys(cfg.connections);
    throw new ConfigError(
      available.length > 0
        ? `Connection "${connName}" not found. ` +
            `Available: ${available.join(", ")}`
        : "No database connections configured.",
    );
  }
  return { name: connName, connection };
}

/**
 * Build a connection from a URL (postgres://, mysql://, sqlite:) or a
 * database file path.
 */
export function connectionFromUrl(url: string): ConnectionConfig {
  const lower = url.toLowerCase();
  if (lower.startsWith("postgres://") || lower.startsWith("postgresql://")) {
    return { driver: "postgres", connectionString: url };
  }
  if (lower.startsWith("mysql://")) {
    return { driver: "mysql", connectionString: url };
  }
  if (lower.startsWith("sqlite:")) {
    const rest = url.slice("sqlite:".length).replace(/^\/\//, "");
    return { driver: "sqlite", path: rest || ":memory:" };
  }
  if (/^[a-z][a-z0-9+.-]*:\/\//i.test(url)) {
    const shown = maskConnectionString({
      driver: "postgres",
      connectionString: url,
    });
    throw new ConfigError(`Unsupported connection URL: ${shown}`);
  }
  return { driver: "sqlite", path: url };
}

/** Driver and host for display; never the credentials. */
export function maskConnectionString(connCfg: ConnectionConfig): string {
  if (connCfg.driver === "sqlite") return connCfg.path ?? ":memory:";
  const raw = connCfg.connectionString ?? "";
  if (raw.startsWith("$")) return raw; // env var reference, safe to show
  try {
    const url = new URL(raw);
    const database = url.pathname.slice(1).split("/")[0] ?? "";
    return `${url.protocol}//${url.host}/${database}`;
  } catch {
    return "[configured]";
  }
}
