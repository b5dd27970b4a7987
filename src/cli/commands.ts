// src/cli/commands.ts
// The sodg commands: each takes a parsed Command and reports an Outcome

import * as fs from "fs";
import * as path from "path";
import type { Logger } from "pino";
import type { Command } from "./types";
import type { SodgConfig } from "../core/config/config";
import { Graph } from "../core/graph/graph";
import { inconsistencies, inspect, toDot } from "../core/graph/inspect";
import { assembleFile, listSources, setupDirectory } from "../core/assembler/directory";
import { loadGraph, saveGraph } from "../core/codec/file";
import { merge } from "../core/merge/merge";
import { Dataizer } from "../core/dataize/dataizer";
import { toHex } from "../core/bytes/hex";
import { ioError } from "../core/errors";
import type { OutputPort } from "../ports/output";
import { attempt, done, type FailureReason, type Outcome } from "../outcome";

export interface CommandIO {
  /** One line of command output on stdout. */
  print(line: string): void;
  /** Sink for bytes written by natives. */
  output: OutputPort;
  cwd: string;
  logger: Logger;
}

export const EXIT_CODES: Record<FailureReason, number> = {
  usage: 1,
  config: 1,
  "internal-error": 1,
  assembly: 2,
  merge: 3,
  dataization: 4,
  io: 5,
};

export function exitCode(o: Outcome<unknown>): number {
  return o.tag === "Done" ? 0 : EXIT_CODES[o.failure.reason];
}

function mtime(file: string): number | undefined {
  try {
    return fs.statSync(file).mtimeMs;
  } catch {
    return undefined;
  }
}

function isDirectory(file: string): boolean {
  try {
    return fs.statSync(file).isDirectory();
  } catch (e) {
    throw ioError(file, e);
  }
}

/** True when `output` exists and is not older than any of `sources`. */
export function isUpToDate(sources: string[], output: string): boolean {
  const built = mtime(output);
  if (built === undefined) return false;
  for (const src of sources) {
    const changed = mtime(src);
    if (changed === undefined || changed > built) return false;
  }
  return true;
}

// ═══════════════════════════════════════════════════════════════════════════════
// COMMANDS
// ═══════════════════════════════════════════════════════════════════════════════

function compile(cmd: Extract<Command, { name: "compile" }>, io: CommandIO): void {
  const source = path.resolve(io.cwd, cmd.source);
  const output = path.resolve(io.cwd, cmd.output);
  const dir = isDirectory(source);
  const sources = dir ? listSources(source).map((rel) => path.join(source, rel)) : [source];

  if (!cmd.force && isUpToDate(sources, output)) {
    io.logger.info({ output: cmd.output }, "binary is up to date, nothing to compile");
    return;
  }

  const g = Graph.empty();
  if (dir) {
    setupDirectory(source, g, { logger: io.logger });
  } else {
    assembleFile(source, g, { logger: io.logger });
  }
  for (const problem of inconsistencies(g)) {
    io.logger.warn({ source: cmd.source }, problem);
  }
  const bytes = saveGraph(output, g);
  io.logger.info({ output: cmd.output, vertices: g.size, edges: g.edgeCount, bytes }, "compiled");
}

function link(cmd: Extract<Command, { name: "merge" }>, io: CommandIO): void {
  const target = path.resolve(io.cwd, cmd.target);
  const g = loadGraph(target);
  for (const input of cmd.inputs) {
    merge(g, loadGraph(path.resolve(io.cwd, input)), io.logger);
    io.logger.info({ input }, "merged");
  }
  saveGraph(target, g);
}

function dataize(cmd: Extract<Command, { name: "dataize" }>, config: SodgConfig, io: CommandIO): Outcome<void> {
  const g = loadGraph(path.resolve(io.cwd, cmd.binary));
  const dataizer = new Dataizer(g, { output: io.output, runtime: config.runtime, logger: io.logger });
  const result = attempt(() => dataizer.dataize(cmd.object));
  if (result.tag === "Done") {
    io.print(toHex(result.value));
  }
  if (cmd.dump !== undefined) {
    const dump = path.resolve(io.cwd, cmd.dump);
    const saved = attempt(() => saveGraph(dump, g));
    if (saved.tag === "Fail" && result.tag === "Done") return saved;
  }
  return result.tag === "Done" ? done(undefined) : result;
}

function dot(cmd: Extract<Command, { name: "dot" }>, io: CommandIO): void {
  const text = toDot(loadGraph(path.resolve(io.cwd, cmd.binary)));
  if (cmd.output === undefined) {
    io.print(text.trimEnd());
    return;
  }
  const out = path.resolve(io.cwd, cmd.output);
  try {
    fs.writeFileSync(out, text);
  } catch (e) {
    throw ioError(out, e);
  }
}

export function runCommand(cmd: Command, config: SodgConfig, io: CommandIO): Outcome<void> {
  io.logger.debug({ command: cmd.name }, "running");
  switch (cmd.name) {
    case "compile":
      return attempt(() => compile(cmd, io));
    case "merge":
      return attempt(() => link(cmd, io));
    case "empty":
      return attempt(() => {
        saveGraph(path.resolve(io.cwd, cmd.output), Graph.empty());
      });
    case "dataize": {
      const loaded = attempt(() => dataize(cmd, config, io));
      return loaded.tag === "Done" ? loaded.value : loaded;
    }
    case "inspect":
      return attempt(() => {
        io.print(inspect(loadGraph(path.resolve(io.cwd, cmd.binary)), cmd.locator));
      });
    case "dot":
      return attempt(() => dot(cmd, io));
  }
}
