import type { Logger } from "../../logging/index.js";

/**
 * Logger that records lines instead of writing them
 */
export function createRecordingLogger(): Logger & { lines: Array<{ level: string; text: string }> } {
  const lines: Array<{ level: string; text: string }> = [];
  const record = (level: string) => (...args: unknown[]): void => {
    lines.push({ level, text: args.map((arg) => String(arg)).join(" ") });
  };
  return {
    lines,
    debug: record("debug"),
    log: record("log"),
    info: record("info"),
    warn: record("warn"),
    error: record("error"),
  };
}
