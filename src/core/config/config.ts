// src/core/config/config.ts
// Configuration for the sodg runtime and CLI

import * as fs from "fs";
import * as path from "path";
import { isLogLevel, type LogLevel } from "../log/logger";

// =========================================================================
// Configuration Types
// =========================================================================

export type RuntimeConfig = {
  /** Maximum nested dataizations before DepthExceeded */
  maxDepth: number;
  /** Maximum locator dereferences (β hops) while resolving one locator */
  maxLocatorJumps: number;
};

export type LogConfig = {
  level: LogLevel;
};

export type SodgConfig = {
  runtime: RuntimeConfig;
  log: LogConfig;
};

/** A config source sets only the keys it knows about. */
export type SodgConfigPatch = {
  runtime?: Partial<RuntimeConfig>;
  log?: Partial<LogConfig>;
};

// =========================================================================
// Default Configuration
// =========================================================================

export const DEFAULT_RUNTIME_CONFIG: RuntimeConfig = {
  maxDepth: 1024,
  maxLocatorJumps: 512,
};

export const DEFAULT_LOG_CONFIG: LogConfig = {
  level: "warn",
};

export const DEFAULT_CONFIG: SodgConfig = {
  runtime: DEFAULT_RUNTIME_CONFIG,
  log: DEFAULT_LOG_CONFIG,
};

export const DEFAULT_CONFIG_FILE = "sodg.config.json";

// =========================================================================
// Configuration Loading
// =========================================================================

function intFromEnv(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === "") return undefined;
  const n = parseInt(raw, 10);
  return Number.isNaN(n) ? undefined : n;
}

/**
 * Load configuration from environment variables.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env, prefix = "SODG"): SodgConfigPatch {
  const patch: SodgConfigPatch = {};

  const maxDepth = intFromEnv(env[`${prefix}_MAX_DEPTH`]);
  const maxLocatorJumps = intFromEnv(env[`${prefix}_MAX_LOCATOR_JUMPS`]);
  if (maxDepth !== undefined || maxLocatorJumps !== undefined) {
    patch.runtime = {};
    if (maxDepth !== undefined) patch.runtime.maxDepth = maxDepth;
    if (maxLocatorJumps !== undefined) patch.runtime.maxLocatorJumps = maxLocatorJumps;
  }

  const level = env[`${prefix}_LOG_LEVEL`];
  if (level !== undefined && isLogLevel(level)) {
    patch.log = { level };
  }

  return patch;
}

/**
 * Load configuration from a JSON file.
 */
export function configFromFile(filePath: string): SodgConfigPatch {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Config file not found: ${filePath}`);
  }

  const ext = path.extname(filePath).toLowerCase();
  if (ext !== ".json") {
    throw new Error(`Unsupported config file format: ${ext}`);
  }

  const content = fs.readFileSync(filePath, "utf8");
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (e) {
    throw new Error(`Config file ${filePath} is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
  }
  return configFromObject(data);
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function intField(obj: Record<string, unknown>, section: string, ...keys: string[]): number | undefined {
  for (const key of keys) {
    const v = obj[key];
    if (v === undefined) continue;
    if (typeof v !== "number" || !Number.isInteger(v)) {
      throw new Error(`${section}.${key} must be an integer`);
    }
    return v;
  }
  return undefined;
}

/**
 * Create configuration from a plain object (e.g., from parsed JSON).
 * Accepts camelCase and snake_case keys.
 */
export function configFromObject(data: unknown): SodgConfigPatch {
  if (!isRecord(data)) {
    throw new Error("Config must be a JSON object");
  }
  const patch: SodgConfigPatch = {};

  const runtimeData = data.runtime;
  if (runtimeData !== undefined) {
    if (!isRecord(runtimeData)) throw new Error("runtime must be an object");
    patch.runtime = {};
    const maxDepth = intField(runtimeData, "runtime", "maxDepth", "max_depth");
    const maxLocatorJumps = intField(runtimeData, "runtime", "maxLocatorJumps", "max_locator_jumps");
    if (maxDepth !== undefined) patch.runtime.maxDepth = maxDepth;
    if (maxLocatorJumps !== undefined) patch.runtime.maxLocatorJumps = maxLocatorJumps;
  }

  const logData = data.log;
  if (logData !== undefined) {
    if (!isRecord(logData)) throw new Error("log must be an object");
    const level = logData.level;
    if (level !== undefined) {
      if (typeof level !== "string" || !isLogLevel(level)) {
        throw new Error(`log.level must be one of fatal, error, warn, info, debug, trace, silent`);
      }
      patch.log = { level };
    }
  }

  return patch;
}

/**
 * Merge configs with later ones overriding earlier ones.
 */
export function mergeConfigs(...configs: SodgConfigPatch[]): SodgConfig {
  const result: SodgConfig = {
    runtime: { ...DEFAULT_CONFIG.runtime },
    log: { ...DEFAULT_CONFIG.log },
  };

  for (const cfg of configs) {
    if (cfg.runtime) {
      result.runtime = { ...result.runtime, ...cfg.runtime };
    }
    if (cfg.log) {
      result.log = { ...result.log, ...cfg.log };
    }
  }

  return result;
}

/**
 * Auto-detect and load configuration.
 * Priority: CLI overrides > config file > environment > defaults
 */
export function loadConfig(options?: {
  configFile?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: SodgConfigPatch;
}): SodgConfig {
  const layers: SodgConfigPatch[] = [configFromEnv(options?.env)];

  if (options?.configFile) {
    layers.push(configFromFile(options.configFile));
  } else {
    const fallback = path.join(options?.cwd ?? process.cwd(), DEFAULT_CONFIG_FILE);
    if (fs.existsSync(fallback)) {
      layers.push(configFromFile(fallback));
    }
  }

  if (options?.overrides) {
    layers.push(options.overrides);
  }

  return mergeConfigs(...layers);
}

// =========================================================================
// Config Validation
// =========================================================================

export type ConfigValidation = {
  valid: boolean;
  errors: string[];
  warnings: string[];
};

export function validateConfig(config: SodgConfig): ConfigValidation {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (config.runtime.maxDepth < 1) {
    errors.push("maxDepth must be at least 1");
  } else if (config.runtime.maxDepth < 16) {
    warnings.push("maxDepth is very low, ordinary programs may fail with DepthExceeded");
  }
  if (config.runtime.maxLocatorJumps < 1) {
    errors.push("maxLocatorJumps must be at least 1");
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}
