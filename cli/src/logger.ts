/**
 * Timestamped console logger for the CLI
 *
 * Every line is prefixed with the time elapsed since the logger was created.
 * In JSON mode each line is a single JSON object instead.
 */

import chalk from "chalk";
import { formatElapsed } from "./duration.js";

export type LogLevel = "info" | "warn" | "error";

export type LogFields = Record<string, string | number | boolean | undefined>;

export interface Logger {
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

export interface LoggerOptions {
  /** Emit one JSON object per line */
  json?: boolean;
  /** Clock origin (default: now) */
  startedAt?: number;
  now?: () => number;
  /** Sink for info and warn lines (default: console.log) */
  write?: (line: string) => void;
  /** Sink for error lines (default: console.error) */
  writeError?: (line: string) => void;
}

const colorFor: Record<LogLevel, (text: string) => string> = {
  info: (text) => text,
  warn: (text) => chalk.yellow(text),
  error: (text) => chalk.red(text),
};

export function createLogger(options: LoggerOptions = {}): Logger {
  const now = options.now ?? Date.now;
  const startedAt = options.startedAt ?? now();
  const write = options.write ?? ((line: string) => console.log(line));
  const writeError = options.writeError ?? ((line: string) => console.error(line));

  const log = (level: LogLevel, message: string, fields: LogFields = {}) => {
    const elapsedMs = now() - startedAt;
    const sink = level === "error" ? writeError : write;

    if (options.json) {
      sink(JSON.stringify({ elapsedMs, level, message, ...fields }));
      return;
    }

    sink(`${chalk.gray(`[${formatElapsed(elapsedMs)}]:`)} ${colorFor[level](message)}`);
  };

  return {
    info: (message, fields) => log("info", message, fields),
    warn: (message, fields) => log("warn", message, fields),
    error: (message, fields) => log("error", message, fields),
  };
}
