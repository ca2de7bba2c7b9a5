export const NULL_TEXT = "NULL";
const MAX_INLINE_BYTES = 32;

/** Turns the raw cell values of one backend into display text. */
export interface RowStringifier {
  stringify(value: unknown): string;
  stringifyRow(values: readonly unknown[]): string[];
}

function isBinary(value: unknown): value is Uint8Array {
  return value instanceof Uint8Array;
}

abstract class BaseStringifier implements RowStringifier {
  stringifyRow(values: readonly unknown[]): string[] {
    return values.map((v) => this.stringify(v));
  }

  stringify(value: unknown): string {
    if (value === null || value === undefined) return NULL_TEXT;
    if (value instanceof Date) {
      return Number.isNaN(value.getTime())
        ? String(value)
        : value.toISOString();
    }
    if (isBinary(value)) return this.binary(value);
    if (typeof value === "bigint") return value.toString();
    if (typeof value === "object") {
      try {
        return JSON.stringify(value);
      } catch {
        return "[Object]";
      }
    }
    return String(value);
  }

  private binary(value: Uint8Array): string {
    if (value.length > MAX_INLINE_BYTES) return `[BLOB ${value.length} bytes]`;
    return this.hexLiteral(Buffer.from(value).toString("hex"));
  }

  protected abstract hexLiteral(hex: string): string;
}

/** pg already parses numbers, booleans, dates and json columns. */
export class PostgresStringifier extends BaseStringifier {
  protected hexLiteral(hex: string): string {
    return `\\x${hex}`;
  }
}

/**
 * mysql2 returns DECIMAL as strings, DATETIME as Date and BIT/BLOB as
 * buffers.
 */
export class MysqlStringifier extends BaseStringifier {
  protected hexLiteral(hex: string): string {
    return `0x${hex}`;
  }
}

/** better-sqlite3 yields only null, number, bigint, string and Buffer. */
export class SqliteStringifier extends BaseStringifier {
  protected hexLiteral(hex: string): string {
    return `X'${hex}'`;
  }
}
