import type { Logger } from "@switchyard/schemas";
import { redactRecord } from "./redact.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

/** Ids lifted out of `data` into the line prefix, shortened to their first 8 characters. */
const CONTEXT_IDS = [
  ["session_id", "session"],
  ["execution_id", "exec"],
] as const;

export interface ConsoleLoggerOptions {
  /** Lines below this level are dropped. Defaults to "info". */
  level?: LogLevel;
  write?: (level: LogLevel, line: string) => void;
}

function writeToConsole(level: LogLevel, line: string): void {
  if (level === "error") console.error(line);
  else if (level === "warn") console.warn(line);
  else console.log(line);
}

/**
 * One line per entry: `[switchyard:<scope>] session=… exec=… <message> <data>`.
 * Session and execution ids come from `data`; the rest is redacted and
 * appended as JSON.
 */
export class ConsoleLogger implements Logger {
  private prefix: string;
  private threshold: number;
  private write: (level: LogLevel, line: string) => void;

  constructor(scope: string, options: ConsoleLoggerOptions = {}) {
    this.prefix = `[switchyard:${scope.replace(/\s+/g, "_").slice(0, 64)}]`;
    this.threshold = LEVEL_ORDER[options.level ?? "info"];
    this.write = options.write ?? writeToConsole;
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log("warn", message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log("error", message, data);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log("debug", message, data);
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < this.threshold) return;
    const parts = [this.prefix];
    const rest: Record<string, unknown> = { ...data };
    for (const [key, label] of CONTEXT_IDS) {
      const id = rest[key];
      if (typeof id !== "string") continue;
      parts.push(`${label}=${id.slice(0, 8)}`);
      delete rest[key];
    }
    parts.push(message);
    if (Object.keys(rest).length > 0) parts.push(JSON.stringify(redactRecord(rest)));
    this.write(level, parts.join(" "));
  }
}

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
};
