// src/core/log/index.ts
export { makeLogger, makeNoopLogger, isLogLevel, LOG_LEVELS } from "./logger";
export type { Logger, LogLevel } from "./logger";
