// src/cli/index.ts
export { EXIT_CODES, exitCode, isUpToDate, runCommand } from "./commands";
export type { CommandIO } from "./commands";
export type { Command, CommandName } from "./types";
