import { describe, expect, it } from "vitest";
import { exportRow, isNullMarker, uniqueKeys } from "./row-export.js";

describe("isNullMarker", () => {
  it("matches the null spellings case-insensitively", () => {
    expect(isNullMarker("null")).toBe(true);
    expect(isNullMarker("NULL")).toBe(true);
    expect(isNullMarker("<null>")).toBe(true);
    expect(isNullMarker(" (Null) ")).toBe(true);
    expect(isNullMarker("nil")).toBe(false);
    expect(isNullMarker("")).toBe(false);
  });
});

describe("uniqueKeys", () => {
  it("suffixes repeated headers", () => {
    expect(uniqueKeys(["id", "id", "name", "id"])).toEqual([
      "id",
      "id_2",
      "name",
      "id_3",
    ]);
  });

  it("skips suffixes that are already headers", () => {
    expect(uniqueKeys(["id", "id", "id_2"])).toEqual(["id", "id_3", "id_2"]);
  });
});

describe("exportRow", () => {
  it("maps headers to cells", () => {
    expect(exportRow(["id", "name"], ["1", "null"])).toEqual({
      ok: true,
      text: '{"id":"1","name":null}',
    });
  });

  it("keeps column order for integer-like headers", () => {
    expect(exportRow(["name", "2021", "1"], ["ann", "a", "b"])).toEqual({
      ok: true,
      text: '{"name":"ann","2021":"a","1":"b"}',
    });
  });

  it("escapes keys and values as JSON strings", () => {
    expect(exportRow(['say "hi"'], ["a\nb"])).toEqual({
      ok: true,
      text: '{"say \\"hi\\"":"a\\nb"}',
    });
  });

  it("keeps every column when headers repeat", () => {
    expect(exportRow(["id", "id"], ["1", "2"])).toEqual({
      ok: true,
      text: '{"id":"1","id_2":"2"}',
    });
  });

  it("reports an arity mismatch", () => {
    expect(exportRow(["a", "b"], ["1", "2", "3"])).toEqual({
      ok: false,
      reason: "row has 3 cell(s) but the result has 2 column(s)",
    });
  });
});
