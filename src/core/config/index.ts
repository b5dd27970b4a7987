// src/core/config/index.ts
// Configuration system exports

export {
  type RuntimeConfig,
  type LogConfig,
  type SodgConfig,
  type SodgConfigPatch,
  type ConfigValidation,
  DEFAULT_RUNTIME_CONFIG,
  DEFAULT_LOG_CONFIG,
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_FILE,
  configFromEnv,
  configFromFile,
  configFromObject,
  mergeConfigs,
  loadConfig,
  validateConfig,
} from "./config";
