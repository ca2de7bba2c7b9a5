export type QueryType = "SELECT" | "INSERT" | "UPDATE" | "DELETE" | "UNKNOWN";

const KNOWN: ReadonlySet<string> = new Set([
  "SELECT",
  "INSERT",
  "UPDATE",
  "DELETE",
]);

function isKnown(token: string): token is Exclude<QueryType, "UNKNOWN"> {
  return KNOWN.has(token);
}

/** Classify a statement by its first whitespace-delimited token. */
export function classifySql(sql: string): QueryType {
  const first = sql.trim().split(/\s+/, 1)[0]?.toUpperCase() ?? "";
  return isKnown(first) ? first : "UNKNOWN";
}
