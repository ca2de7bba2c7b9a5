import { describe, expect, it } from "vitest";
import { keyOf } from "../editor/keys.js";
import {
  digitTab,
  globalBindings,
  gridBindings,
  keyName,
  lookup,
} from "./keymap.js";

describe("keymap", () => {
  it("names keys with their modifiers", () => {
    expect(keyName(keyOf("q", { ctrl: true }))).toBe("C-q");
    expect(keyName(keyOf("x", { meta: true }))).toBe("M-x");
    expect(keyName(keyOf("G"))).toBe("G");
  });

  it("finds global commands", () => {
    expect(lookup(globalBindings, keyOf("f5"))).toBe("query.run");
    expect(lookup(globalBindings, keyOf("q", { ctrl: true }))).toBe("quit");
    expect(lookup(globalBindings, keyOf("q"))).toBeNull();
  });

  it("binds grid keys and their arrow aliases", () => {
    expect(lookup(gridBindings, keyOf("j"))).toBe("grid.row.next");
    expect(lookup(gridBindings, keyOf("down"))).toBe("grid.row.next");
    expect(lookup(gridBindings, keyOf(">"))).toBe("grid.scroll.right");
    expect(lookup(gridBindings, keyOf("W"))).toBe("grid.width.shrink");
    expect(lookup(gridBindings, keyOf("Y"))).toBe("grid.copy.row");
    expect(lookup(gridBindings, keyOf("z"))).toBeNull();
  });

  it("binds every key once", () => {
    const keys = gridBindings.flatMap((b) => b.keys);
    expect(new Set(keys).size).toBe(keys.length);
  });

  it("maps digits to tab indexes", () => {
    expect(digitTab(keyOf("1"))).toBe(0);
    expect(digitTab(keyOf("2"))).toBe(1);
    expect(digitTab(keyOf("0"))).toBeNull();
    expect(digitTab(keyOf("2", { ctrl: true }))).toBeNull();
  });
});
