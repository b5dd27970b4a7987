// bin/sodg-cli-lib.ts
// Argument parsing, help, version and the driver for the sodg command
// Exported functions for testing

import * as fs from "fs";
import * as path from "path";
import type { Logger } from "pino";
import { exitCode, runCommand, type Command } from "../src/cli";
import { loadConfig, validateConfig, type SodgConfig } from "../src/core/config/config";
import { makeLogger, type LogLevel } from "../src/core/log/logger";
import type { OutputPort } from "../src/ports/output";
import {
  allDiagnostics,
  configError,
  done,
  formatDiagnostic,
  usageError,
  type Fail,
  type Outcome,
} from "../src/outcome";

export type { Command } from "../src/cli";

// ═══════════════════════════════════════════════════════════════════════════════
// TYPE DEFINITIONS
// ═══════════════════════════════════════════════════════════════════════════════

export type CliArgs = {
  help?: boolean;
  version?: boolean;
  verbose?: boolean;
  trace?: boolean;
  force?: boolean;
  config?: string;
  dump?: string;
  command?: string;
  positionals: string[];
  unknown: string[];
};

export type CliConfig = {
  command: Command;
  /** Set by --verbose or --trace; otherwise the configured level applies. */
  logLevel?: LogLevel;
  configFile?: string;
};

// ═══════════════════════════════════════════════════════════════════════════════
// ARGUMENT PARSING
// ═══════════════════════════════════════════════════════════════════════════════

export function parseCliArgs(args: string[]): CliArgs {
  const result: CliArgs = { positionals: [], unknown: [] };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "--help" || arg === "-h") {
      result.help = true;
    } else if (arg === "--version" || arg === "-v") {
      result.version = true;
    } else if (arg === "--verbose") {
      result.verbose = true;
    } else if (arg === "--trace") {
      result.trace = true;
    } else if (arg === "--force" || arg === "-f") {
      result.force = true;
    } else if (arg === "--config" || arg === "-c") {
      result.config = args[++i] ?? "";
    } else if (arg === "--dump") {
      result.dump = args[++i] ?? "";
    } else if (arg.startsWith("-") && arg !== "-") {
      result.unknown.push(arg);
    } else if (result.command === undefined) {
      result.command = arg;
    } else {
      result.positionals.push(arg);
    }
  }

  return result;
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELP TEXT
// ═══════════════════════════════════════════════════════════════════════════════

export function getHelpText(): string {
  return `
sodg - assemble, link and dataize object graphs

USAGE:
  sodg [options] <command> [arguments]

COMMANDS:
  compile [--force] <source> <binary>    Assemble a .sodg file or a directory of them
  merge <target> <binary>...             Fold binaries into the target binary
  empty <binary>                         Write a graph holding only the root
  dataize [--dump <file>] <binary> <name>
                                         Print the bytes of Φ.<name> as hex
  inspect <binary> [locator]             List the tree under a locator (default Φ)
  dot <binary> [file]                    Render the graph in Graphviz format

OPTIONS:
  -h, --help                             Show this help message
  -v, --version                          Show version information
  --verbose                              Log at info level
  --trace                                Log every dataization step
  -c, --config <file>                    Read settings from a JSON file
  -f, --force                            Recompile even if the binary is newer

EXIT STATUS:
  0 success, 1 usage, 2 assembly, 3 merge, 4 dataization, 5 I/O

EXAMPLES:
  sodg compile app.sodg app.sodg.bin
  sodg dataize app.sodg.bin foo
  sodg inspect app.sodg.bin Φ.foo
`.trim();
}

// ═══════════════════════════════════════════════════════════════════════════════
// VERSION
// ═══════════════════════════════════════════════════════════════════════════════

export function getVersion(): string {
  try {
    const pkgPath = path.join(__dirname, "..", "package.json");
    const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, "utf8"));
    if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
      return `sodg v${pkg.version}`;
    }
    return "sodg v0.1.0";
  } catch {
    return "sodg v0.1.0";
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION BUILDING
// ═══════════════════════════════════════════════════════════════════════════════

function arity(name: string, got: string[], min: number, max: number, usage: string): Outcome<string[]> {
  if (got.length < min || got.length > max) {
    return usageError(`'${name}' expects ${usage}`);
  }
  return done(got);
}

function buildCommand(args: CliArgs): Outcome<Command> {
  const p = args.positionals;
  switch (args.command) {
    case undefined:
      return usageError("no command given, see --help");
    case "compile": {
      const a = arity("compile", p, 2, 2, "<source> <binary>");
      if (a.tag === "Fail") return a;
      return done({ name: "compile", source: p[0], output: p[1], force: args.force === true });
    }
    case "merge": {
      const a = arity("merge", p, 2, Infinity, "<target> <binary>...");
      if (a.tag === "Fail") return a;
      return done({ name: "merge", target: p[0], inputs: p.slice(1) });
    }
    case "empty": {
      const a = arity("empty", p, 1, 1, "<binary>");
      if (a.tag === "Fail") return a;
      return done({ name: "empty", output: p[0] });
    }
    case "dataize": {
      const a = arity("dataize", p, 2, 2, "<binary> <name>");
      if (a.tag === "Fail") return a;
      if (args.dump === "") return usageError("--dump needs a file");
      return done({ name: "dataize", binary: p[0], object: p[1], dump: args.dump });
    }
    case "inspect": {
      const a = arity("inspect", p, 1, 2, "<binary> [locator]");
      if (a.tag === "Fail") return a;
      return done({ name: "inspect", binary: p[0], locator: p[1] ?? "Φ" });
    }
    case "dot": {
      const a = arity("dot", p, 1, 2, "<binary> [file]");
      if (a.tag === "Fail") return a;
      return done({ name: "dot", binary: p[0], output: p[1] });
    }
    default:
      return usageError(`unknown command '${args.command}'`);
  }
}

export function buildConfig(args: CliArgs): Outcome<CliConfig> {
  if (args.unknown.length > 0) {
    return usageError(`unknown option ${args.unknown.join(", ")}`);
  }
  if (args.config === "") {
    return usageError("--config needs a file");
  }
  const command = buildCommand(args);
  if (command.tag === "Fail") return command;

  const config: CliConfig = { command: command.value };
  if (args.trace) {
    config.logLevel = "trace";
  } else if (args.verbose) {
    config.logLevel = "info";
  }
  if (args.config !== undefined) {
    config.configFile = args.config;
  }
  return done(config);
}

// ═══════════════════════════════════════════════════════════════════════════════
// DRIVER
// ═══════════════════════════════════════════════════════════════════════════════

export interface CliEnv {
  /** stdout, one line per call */
  out(line: string): void;
  /** stderr, one line per call */
  err(line: string): void;
  output: OutputPort;
  cwd: string;
  env: NodeJS.ProcessEnv;
  /** Defaults to a pino logger on stderr at the configured level. */
  makeLogger?: (level: LogLevel) => Logger;
}

function report(f: Fail, env: CliEnv, logger?: Logger): void {
  for (const d of allDiagnostics(f.failure)) {
    env.err(formatDiagnostic(d));
  }
  logger?.error({ reason: f.failure.reason, context: f.failure.context }, f.failure.message);
}

export function runCli(argv: string[], env: CliEnv): number {
  const args = parseCliArgs(argv);

  if (args.help) {
    env.out(getHelpText());
    return 0;
  }
  if (args.version) {
    env.out(getVersion());
    return 0;
  }

  const built = buildConfig(args);
  if (built.tag === "Fail") {
    report(built, env);
    return exitCode(built);
  }
  const cli = built.value;

  let config: SodgConfig;
  try {
    config = loadConfig({
      configFile: cli.configFile === undefined ? undefined : path.resolve(env.cwd, cli.configFile),
      cwd: env.cwd,
      env: env.env,
      overrides: cli.logLevel ? { log: { level: cli.logLevel } } : undefined,
    });
  } catch (e) {
    const f = configError(e instanceof Error ? e.message : String(e));
    report(f, env);
    return exitCode(f);
  }

  const logger = (env.makeLogger ?? makeLogger)(config.log.level);
  const validation = validateConfig(config);
  for (const w of validation.warnings) logger.warn(w);
  if (!validation.valid) {
    const f = configError(validation.errors.join("; "));
    report(f, env, logger);
    return exitCode(f);
  }

  const outcome = runCommand(cli.command, config, {
    print: env.out,
    output: env.output,
    cwd: env.cwd,
    logger,
  });
  if (outcome.tag === "Fail") {
    report(outcome, env, logger);
  }
  return exitCode(outcome);
}
