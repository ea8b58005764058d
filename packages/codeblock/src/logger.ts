import type { LogLevel } from "./types.js";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export type Logger = {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, err?: unknown): void;
};

/** Minimal sink so tests can capture output instead of writing to the console. */
export type LogSink = Pick<Console, "log" | "warn" | "error">;

/**
 * Console logger with a `[scope]` prefix, filtered by `level`.
 */
export function createLogger(scope: string, level: LogLevel = "info", sink: LogSink = console): Logger {
  const threshold = LEVEL_ORDER[level];
  const enabled = (l: LogLevel) => LEVEL_ORDER[l] >= threshold;
  const prefix = `[${scope}]`;

  return {
    debug(message) {
      if (enabled("debug")) sink.log(`${prefix} ${message}`);
    },
    info(message) {
      if (enabled("info")) sink.log(`${prefix} ${message}`);
    },
    warn(message) {
      if (enabled("warn")) sink.warn(`${prefix} ${message}`);
    },
    error(message, err) {
      if (!enabled("error")) return;
      if (err === undefined) {
        sink.error(`${prefix} ${message}`);
      } else {
        sink.error(`${prefix} ${message}`, err instanceof Error ? err.message : err);
      }
    },
  };
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};
