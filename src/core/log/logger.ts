// src/core/log/logger.ts
// Pino logger factory: JSON lines on stderr, stdout stays free for command output

import pino from "pino";
import type { Logger } from "pino";

export type { Logger } from "pino";

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

export const LOG_LEVELS: readonly LogLevel[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

export function isLogLevel(s: string): s is LogLevel {
  return LOG_LEVELS.some((l) => l === s);
}

export function makeLogger(level: LogLevel = "warn", bindings?: Record<string, unknown>): Logger {
  return pino(
    {
      level,
      base: { ...bindings, app: "sodg" },
      messageKey: "msg",
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    // fd 2; sync so a failing command still flushes before exit
    pino.destination({ dest: 2, sync: true })
  );
}

/**
 * For tests and library defaults: keeps the Logger type, emits nothing.
 */
export function makeNoopLogger(): Logger {
  return pino({ enabled: false });
}
