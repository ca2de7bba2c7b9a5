import { describe, expect, it } from "vitest";
import { displayWidth, fitToWidth } from "./width.js";

describe("displayWidth", () => {
  it("counts wide characters as two columns", () => {
    expect(displayWidth("abc")).toBe(3);
    expect(displayWidth("日本")).toBe(4);
  });
});

describe("fitToWidth", () => {
  it("pads short text", () => {
    expect(fitToWidth("abc", 5)).toBe("abc  ");
  });

  it("truncates long text with an ellipsis", () => {
    expect(fitToWidth("abcdef", 4)).toBe("abc…");
  });

  it("does not split a wide character", () => {
    expect(fitToWidth("日本語", 5)).toBe("日本…");
    expect(fitToWidth("日本語", 4)).toBe("日… ");
  });

  it("returns nothing for a zero width", () => {
    expect(fitToWidth("abc", 0)).toBe("");
  });
});
