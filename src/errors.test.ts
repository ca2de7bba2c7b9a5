import { describe, expect, it } from "vitest";
import { ConfigError, QueryError, errorMessage } from "./errors.js";

describe("errors", () => {
  it("carries a code and a cause", () => {
    const cause = new Error("socket closed");
    const err = new QueryError("Connection lost", "CONNECTION", { cause });
    expect(err.name).toBe("QueryError");
    expect(err.code).toBe("CONNECTION");
    expect(err.cause).toBe(cause);
    expect(err).toBeInstanceOf(Error);
  });

  it("names config errors", () => {
    expect(new ConfigError("bad").name).toBe("ConfigError");
  });

  it("normalises thrown values to a message", () => {
    const err = new QueryError("Unsupported query", "UNSUPPORTED_QUERY");
    expect(errorMessage(err)).toBe("Unsupported query");
    expect(errorMessage("plain")).toBe("plain");
    expect(errorMessage(42)).toBe("42");
  });
});
