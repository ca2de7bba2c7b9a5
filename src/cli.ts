import { InvalidArgumentError } from "commander";
import {
  DEFAULT_CONFIG_PATH,
  connectionFromUrl,
  getConnection,
  loadConfigFile,
  resolveConfig,
  resolvePath,
  type ConnectionConfig,
  type WorkspaceConfig,
} from "./config.js";

export type CliOptions = {
  config?: string;
  url?: string;
  pageSize?: number;
  logFile?: string;
};

export type Launch = {
  /** Connection name, or the masked URL when given with --url. */
  name: string;
  connection: ConnectionConfig;
  pageSize: number;
  queryTimeout: number;
  clipboard: WorkspaceConfig["clipboard"];
  logFile: string;
};

export function parsePageSize(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1 || n > 10_000) {
    throw new InvalidArgumentError(
      "Page size must be an integer between 1 and 10000.",
    );
  }
  return n;
}

/** Merge the config file with command-line options. Options win. */
export function resolveLaunch(
  connectionName: string | undefined,
  opts: CliOptions,
  load: (file: string, required: boolean) => WorkspaceConfig = loadConfigFile,
): Launch {
  const cfg = load(
    opts.config ?? DEFAULT_CONFIG_PATH,
    opts.config !== undefined,
  );
  const merged = resolveConfig({
    ...cfg,
    ...(opts.pageSize !== undefined ? { pageSize: opts.pageSize } : {}),
  });

  const picked = opts.url
    ? { name: "url", connection: connectionFromUrl(opts.url) }
    : getConnection(merged, connectionName);

  return {
    name: picked.name,
    connection: picked.connection,
    pageSize: merged.pageSize,
    queryTimeout: merged.queryTimeout,
    clipboard: merged.clipboard,
    logFile: resolvePath(opts.logFile ?? merged.logFile),
  };
}
