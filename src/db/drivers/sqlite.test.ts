import { afterEach, describe, expect, it } from "vitest";
import { QueryStatsStore } from "../../stats.js";
import { DriverSession } from "../session.js";
import { SqliteDriver } from "./sqlite.js";

describe("SqliteDriver", () => {
  let driver: SqliteDriver;

  afterEach(async () => {
    await driver.close();
  });

  async function open() {
    driver = new SqliteDriver(":memory:", 1000);
    await driver.connect();
    await driver.run(
      "CREATE TABLE users (id INTEGER PRIMARY KEY, name TEXT, avatar BLOB)",
    );
    return driver;
  }

  it("refuses work before connect", async () => {
    driver = new SqliteDriver(":memory:", 1000);
    await expect(driver.fetch("SELECT 1")).rejects.toMatchObject({
      code: "NOT_CONNECTED",
    });
    expect(await driver.ping()).toBe(false);
  });

  it("reports affected rows", async () => {
    await open();
    expect(
      await driver.run(
        "INSERT INTO users (id, name) VALUES (1, 'ann'), (2, 'bob')",
      ),
    ).toBe(2);
    expect(await driver.run("UPDATE users SET name = 'amy' WHERE id = 1")).toBe(
      1,
    );
    expect(await driver.run("DELETE FROM users WHERE id = 99")).toBe(0);
  });

  it("fetches columns and positional rows", async () => {
    await open();
    await driver.run(
      "INSERT INTO users VALUES (1, 'ann', x'00ff'), (2, NULL, NULL)",
    );

    const result = await driver.fetch(
      "SELECT id, name, avatar FROM users ORDER BY id",
    );

    expect(result.columns).toEqual(["id", "name", "avatar"]);
    expect(result.rows.map((r) => driver.stringifier.stringifyRow(r))).toEqual([
      ["1", "ann", "X'00ff'"],
      ["2", "NULL", "NULL"],
    ]);
  });

  it("keeps repeated column names", async () => {
    await open();
    const result = await driver.fetch("SELECT 1 AS x, 2 AS x");
    expect(result).toEqual({ columns: ["x", "x"], rows: [[1, 2]] });
  });

  it("answers ping once connected", async () => {
    await open();
    expect(await driver.ping()).toBe(true);
  });

  it("runs through a session", async () => {
    await open();
    const session = new DriverSession(driver, new QueryStatsStore());
    await session.execute("INSERT INTO users (id, name) VALUES (1, 'ann')");
    const outcome = await session.execute("select name from users");
    expect(outcome).toMatchObject({
      kind: "rows",
      headers: ["name"],
      rows: [["ann"]],
      rowCount: 1,
    });
  });
});
