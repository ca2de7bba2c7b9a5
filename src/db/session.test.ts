import { describe, expect, it, vi } from "vitest";
import { QueryError } from "../errors.js";
import { QueryStatsStore } from "../stats.js";
import type { DatabaseDriver, RawResult } from "./drivers/index.js";
import { DriverSession, affectedMessage, fetchedMessage } from "./session.js";
import { SqliteStringifier } from "./stringify.js";

class FakeDriver implements DatabaseDriver {
  readonly driverName = "sqlite";
  readonly stringifier = new SqliteStringifier();
  result: RawResult = { columns: [], rows: [] };
  affected = 0;
  failure: Error | null = null;
  statements: string[] = [];
  closed = false;

  async connect() {}

  async fetch(sql: string): Promise<RawResult> {
    this.statements.push(sql);
    if (this.failure) throw this.failure;
    return this.result;
  }

  async run(sql: string): Promise<number> {
    this.statements.push(sql);
    if (this.failure) throw this.failure;
    return this.affected;
  }

  async ping() {
    return true;
  }

  async close() {
    this.closed = true;
  }
}

/** A clock that advances `step` ms on every reading. */
function steppingClock(step: number) {
  let t = 1000;
  return vi.fn(() => {
    const now = t;
    t += step;
    return now;
  });
}

function setup(step = 0) {
  const driver = new FakeDriver();
  const stats = new QueryStatsStore();
  const session = new DriverSession(driver, stats, steppingClock(step));
  return { driver, stats, session };
}

describe("messages", () => {
  it("formats fetched and affected results", () => {
    expect(fetchedMessage(2, 12)).toBe(
      "Successfully run. Total query runtime: 12 ms.\n2 rows fetched.",
    );
    expect(affectedMessage("DELETE", 3, 7)).toBe(
      "DELETE 3 rows affected.\nQuery completed in 7 msec.",
    );
  });
});

describe("DriverSession", () => {
  it("fetches and stringifies rows", async () => {
    const { driver, stats, session } = setup(12);
    driver.result = { columns: ["id", "name"], rows: [[1, "ann"], [2, null]] };

    const outcome = await session.execute("select id, name from users");

    expect(outcome).toEqual({
      kind: "rows",
      headers: ["id", "name"],
      rows: [
        ["1", "ann"],
        ["2", "NULL"],
      ],
      rowCount: 2,
      elapsedMs: 12,
      message: "Successfully run. Total query runtime: 12 ms.\n2 rows fetched.",
    });
    expect(stats.latest()).toMatchObject({ rows: 2, elapsedMs: 12 });
  });

  it("runs data-changing statements", async () => {
    const { driver, stats, session } = setup(5);
    driver.affected = 3;

    const outcome = await session.execute("INSERT INTO t VALUES (1), (2), (3)");

    expect(outcome).toEqual({
      kind: "affected",
      statement: "INSERT",
      rowCount: 3,
      elapsedMs: 5,
      message: "INSERT 3 rows affected.\nQuery completed in 5 msec.",
    });
    expect(stats.latest()).toMatchObject({ rows: 3, elapsedMs: 5 });
  });

  it("labels updates and deletes", async () => {
    const { session } = setup();
    await expect(session.execute("update t set a = 1")).resolves.toMatchObject({
      statement: "UPDATE",
    });
    await expect(session.execute("delete from t")).resolves.toMatchObject({
      statement: "DELETE",
    });
  });

  it("rejects unsupported statements without reaching the driver", async () => {
    const { driver, stats, session } = setup();
    const err = await session.execute("create table t (a int)").catch(
      (e: unknown) => e,
    );
    expect(err).toBeInstanceOf(QueryError);
    expect(err).toMatchObject({
      code: "UNSUPPORTED_QUERY",
      message: "Unsupported query",
    });
    expect(driver.statements).toEqual([]);
    expect(stats.latest()).toBeNull();
  });

  it("wraps driver failures and leaves the stats alone", async () => {
    const { driver, stats, session } = setup();
    stats.update(7, 1);
    driver.failure = new Error('relation "nope" does not exist');

    const err = await session.execute("select * from nope").catch(
      (e: unknown) => e,
    );

    expect(err).toBeInstanceOf(QueryError);
    expect(err).toMatchObject({
      code: "EXECUTION",
      message: 'relation "nope" does not exist',
    });
    expect(stats.latest()).toMatchObject({ rows: 7, elapsedMs: 1 });
  });

  it("passes query errors from the driver through", async () => {
    const { driver, session } = setup();
    driver.failure = new QueryError("not connected", "NOT_CONNECTED");
    await expect(session.execute("select 1")).rejects.toMatchObject({
      code: "NOT_CONNECTED",
    });
  });

  it("closes the driver", async () => {
    const { driver, session } = setup();
    await session.close();
    expect(driver.closed).toBe(true);
    expect(session.driverName).toBe("sqlite");
  });
});
