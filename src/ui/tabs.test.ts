import { describe, expect, it } from "vitest";
import { RESULT_TABS, TabStrip } from "./tabs.js";

describe("TabStrip", () => {
  it("starts on the first tab", () => {
    const tabs = new TabStrip(RESULT_TABS);
    expect(tabs.index).toBe(0);
    expect(tabs.active).toBe("Data");
  });

  it("cycles both ways", () => {
    const tabs = new TabStrip(RESULT_TABS);
    tabs.previous();
    expect(tabs.active).toBe("Messages");
    tabs.next();
    expect(tabs.active).toBe("Data");
  });

  it("ignores out-of-range indexes", () => {
    const tabs = new TabStrip(RESULT_TABS);
    tabs.setIndex(1);
    tabs.setIndex(5);
    tabs.setIndex(-1);
    expect(tabs.index).toBe(1);
  });

  it("clamps the initial index", () => {
    expect(new TabStrip(["a", "b", "c"], 9).index).toBe(2);
  });
});
