import { describe, expect, it } from "vitest";
import {
  MysqlStringifier,
  PostgresStringifier,
  SqliteStringifier,
} from "./stringify.js";

describe("RowStringifier", () => {
  const pg = new PostgresStringifier();
  const mysql = new MysqlStringifier();
  const sqlite = new SqliteStringifier();

  it("renders null and undefined as NULL", () => {
    expect(pg.stringify(null)).toBe("NULL");
    expect(sqlite.stringify(undefined)).toBe("NULL");
  });

  it("renders scalars", () => {
    expect(pg.stringify(42)).toBe("42");
    expect(pg.stringify(1.5)).toBe("1.5");
    expect(pg.stringify(true)).toBe("true");
    expect(mysql.stringify("12.50")).toBe("12.50");
    expect(sqlite.stringify(9007199254740993n)).toBe("9007199254740993");
  });

  it("renders dates as ISO 8601", () => {
    expect(mysql.stringify(new Date(Date.UTC(2024, 0, 2, 3, 4, 5)))).toBe(
      "2024-01-02T03:04:05.000Z",
    );
  });

  it("renders objects as JSON", () => {
    expect(pg.stringify({ a: 1, b: [true, null] })).toBe(
      '{"a":1,"b":[true,null]}',
    );
  });

  it("writes short binary as each backend's hex literal", () => {
    const bytes = Buffer.from([0xde, 0xad]);
    expect(pg.stringify(bytes)).toBe("\\xdead");
    expect(mysql.stringify(bytes)).toBe("0xdead");
    expect(sqlite.stringify(bytes)).toBe("X'dead'");
  });

  it("summarises long binary", () => {
    expect(sqlite.stringify(Buffer.alloc(40))).toBe("[BLOB 40 bytes]");
  });

  it("stringifies a whole row", () => {
    expect(sqlite.stringifyRow([1, null, "x"])).toEqual(["1", "NULL", "x"]);
  });
});
