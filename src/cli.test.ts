import { InvalidArgumentError } from "commander";
import { describe, expect, it, vi } from "vitest";
import { parsePageSize, resolveLaunch } from "./cli.js";
import { DEFAULT_CONFIG_PATH, resolveConfig } from "./config.js";

const configured = resolveConfig({
  connections: { local: { driver: "sqlite", path: "/tmp/shop.db" } },
  pageSize: 40,
  queryTimeout: 5000,
  clipboard: "memory",
  logFile: "/tmp/querydeck.log",
});

describe("parsePageSize", () => {
  it("accepts integers in range", () => {
    expect(parsePageSize("50")).toBe(50);
  });

  it("rejects anything else", () => {
    expect(() => parsePageSize("0")).toThrow(InvalidArgumentError);
    expect(() => parsePageSize("2.5")).toThrow(InvalidArgumentError);
    expect(() => parsePageSize("many")).toThrow(InvalidArgumentError);
  });
});

describe("resolveLaunch", () => {
  it("reads the default config file when none is given", () => {
    const load = vi.fn(() => configured);
    const launch = resolveLaunch(undefined, {}, load);
    expect(load).toHaveBeenCalledWith(DEFAULT_CONFIG_PATH, false);
    expect(launch).toEqual({
      name: "local",
      connection: { driver: "sqlite", path: "/tmp/shop.db" },
      pageSize: 40,
      queryTimeout: 5000,
      clipboard: "memory",
      logFile: "/tmp/querydeck.log",
    });
  });

  it("requires an explicitly named config file", () => {
    const load = vi.fn(() => configured);
    resolveLaunch("local", { config: "/etc/querydeck.json" }, load);
    expect(load).toHaveBeenCalledWith("/etc/querydeck.json", true);
  });

  it("lets options override the file", () => {
    const launch = resolveLaunch(
      undefined,
      {
        url: "mysql://app@db.local/shop",
        pageSize: 10,
        logFile: "/tmp/other.log",
      },
      () => configured,
    );
    expect(launch.name).toBe("url");
    expect(launch.connection).toEqual({
      driver: "mysql",
      connectionString: "mysql://app@db.local/shop",
    });
    expect(launch.pageSize).toBe(10);
    expect(launch.logFile).toBe("/tmp/other.log");
  });
});
