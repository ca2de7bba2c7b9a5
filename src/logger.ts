import fs from "node:fs";
import path from "node:path";

export type LogLevel = "debug" | "info" | "warn" | "error";

type Sink = (level: LogLevel, line: string) => void;

const consoleSink: Sink = (level, line) => {
  switch (level) {
    case "error":
      console.error(line);
      break;
    case "warn":
      console.warn(line);
      break;
    case "debug":
      console.debug(line);
      break;
    default:
      console.log(line);
  }
};

let sink: Sink = consoleSink;

function format(level: LogLevel, args: unknown[]): string {
  const text = args
    .map((a) => {
      if (a instanceof Error) return a.stack ?? a.message;
      return typeof a === "string" ? a : JSON.stringify(a);
    })
    .join(" ");
  return `${new Date().toISOString()} ${level.toUpperCase().padEnd(5)} ${text}`;
}

// Writes must never take the process down when the output stream is gone.
const safeWrite = (level: LogLevel) => {
  return (...args: unknown[]) => {
    try {
      sink(level, format(level, args));
    } catch (error) {
      if (error instanceof Error && error.message.includes("EPIPE")) {
        return;
      }
      throw error;
    }
  };
};

export const log = {
  debug: safeWrite("debug"),
  info: safeWrite("info"),
  warn: safeWrite("warn"),
  error: safeWrite("error"),
};

/**
 * Redirect all log output to an append-only file. The terminal UI calls this
 * before it takes over the screen. Returns a function that flushes the file
 * and restores console output.
 */
export function logToFile(file: string): () => Promise<void> {
  fs.mkdirSync(path.dirname(file), { recursive: true });
  const stream = fs.createWriteStream(file, { flags: "a" });
  stream.on("error", (err) => {
    sink = consoleSink;
    log.error(`log file ${file} unavailable:`, err);
  });
  sink = (_level, line) => {
    stream.write(line + "\n");
  };
  return () =>
    new Promise<void>((resolve) => {
      sink = consoleSink;
      stream.end(() => resolve());
    });
}

/** Replace the output sink; tests use this to capture lines. */
export function setLogSink(next: Sink | null): void {
  sink = next ?? consoleSink;
}

export default log;
