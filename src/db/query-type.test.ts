import { describe, expect, it } from "vitest";
import { classifySql } from "./query-type.js";

describe("classifySql", () => {
  it("classifies by the first token", () => {
    expect(classifySql("SELECT * FROM users")).toBe("SELECT");
    expect(classifySql("insert into t values (1)")).toBe("INSERT");
    expect(classifySql("  Update t set a = 1")).toBe("UPDATE");
    expect(classifySql("delete from t")).toBe("DELETE");
  });

  it("splits on any whitespace", () => {
    expect(classifySql("select\n  1")).toBe("SELECT");
    expect(classifySql("\tdelete\tfrom t")).toBe("DELETE");
  });

  it("returns UNKNOWN for anything else", () => {
    expect(classifySql("create table t (a int)")).toBe("UNKNOWN");
    expect(classifySql("with x as (select 1) select * from x")).toBe("UNKNOWN");
    expect(classifySql("select*from t")).toBe("UNKNOWN");
    expect(classifySql("")).toBe("UNKNOWN");
  });
});
