import { spawn } from "node:child_process";
import { errorMessage } from "./errors.js";
import { log } from "./logger.js";

export interface Clipboard {
  setText(text: string): Promise<void>;
}

type CopyCommand = { command: string; args: string[] };

export function clipboardCommand(
  platform: NodeJS.Platform = process.platform,
  env: NodeJS.ProcessEnv = process.env,
): CopyCommand {
  switch (platform) {
    case "darwin":
      return { command: "pbcopy", args: [] };
    case "win32":
      return { command: "clip", args: [] };
    default:
      if (env.WAYLAND_DISPLAY) return { command: "wl-copy", args: [] };
      return { command: "xclip", args: ["-selection", "clipboard"] };
  }
}

/** Pipes text into the platform's clipboard tool. */
export class SystemClipboard implements Clipboard {
  private readonly copy: CopyCommand;

  constructor(copy: CopyCommand = clipboardCommand()) {
    this.copy = copy;
  }

  setText(text: string): Promise<void> {
    const { command, args } = this.copy;
    return new Promise((resolve, reject) => {
      const child = spawn(command, args, {
        stdio: ["pipe", "ignore", "ignore"],
      });
      child.on("error", (err) => {
        reject(new Error(`clipboard unavailable (${command}): ${err.message}`));
      });
      child.stdin.on("error", (err) => {
        reject(new Error(`${command} did not take the text: ${err.message}`));
      });
      child.on("close", (code) => {
        if (code === 0) resolve();
        else reject(new Error(`${command} exited with code ${code}`));
      });
      child.stdin.end(text);
    });
  }
}

/** Keeps the last copied text in process. */
export class MemoryClipboard implements Clipboard {
  text = "";

  async setText(text: string): Promise<void> {
    this.text = text;
  }
}

/** Fire-and-forget write; failures end up in the log, never with the caller. */
export function copyToClipboard(clipboard: Clipboard, text: string): void {
  clipboard.setText(text).catch((err: unknown) => {
    log.warn("clipboard write failed:", errorMessage(err));
  });
}
