export type QueryErrorCode =
  | "UNSUPPORTED_QUERY"
  | "NOT_CONNECTED"
  | "CONNECTION"
  | "EXECUTION";

/** Failure reported by the database layer. Shown to the user, never fatal. */
export class QueryError extends Error {
  readonly code: QueryErrorCode;

  constructor(
    message: string,
    code: QueryErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "QueryError";
    this.code = code;
  }
}

/** Invalid configuration file or command-line option. */
export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigError";
  }
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}
