import { afterEach, describe, expect, it } from "vitest";
import {
  MemoryClipboard,
  SystemClipboard,
  clipboardCommand,
  copyToClipboard,
  type Clipboard,
} from "./clipboard.js";
import { setLogSink } from "./logger.js";

afterEach(() => setLogSink(null));

describe("clipboardCommand", () => {
  it("picks the platform tool", () => {
    expect(clipboardCommand("darwin", {})).toEqual({
      command: "pbcopy",
      args: [],
    });
    expect(clipboardCommand("win32", {})).toEqual({
      command: "clip",
      args: [],
    });
    expect(
      clipboardCommand("linux", { WAYLAND_DISPLAY: "wayland-0" }),
    ).toEqual({ command: "wl-copy", args: [] });
    expect(clipboardCommand("linux", {})).toEqual({
      command: "xclip",
      args: ["-selection", "clipboard"],
    });
  });
});

describe("SystemClipboard", () => {
  it("rejects when the tool is missing", async () => {
    const clipboard = new SystemClipboard({
      command: "querydeck-no-such-tool",
      args: [],
    });
    await expect(clipboard.setText("x")).rejects.toThrow(
      "clipboard unavailable (querydeck-no-such-tool)",
    );
  });
});

describe("copyToClipboard", () => {
  it("writes to the clipboard", async () => {
    const clipboard = new MemoryClipboard();
    copyToClipboard(clipboard, "select 1");
    expect(clipboard.text).toBe("select 1");
  });

  it("logs a failed write as a warning", async () => {
    const lines: string[] = [];
    setLogSink((_level, line) => lines.push(line));
    const broken: Clipboard = {
      setText: () => Promise.reject(new Error("no display")),
    };

    copyToClipboard(broken, "x");
    await new Promise((resolve) => setTimeout(resolve, 0));

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/ WARN  clipboard write failed: no display$/);
  });
});
