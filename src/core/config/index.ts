// src/core/config/index.ts
// Configuration system exports

export {
  type RuntimeConfig,
  type LoggingConfig,
  type FormworkConfig,
  type PartialFormworkConfig,
  type ConfigValidation,
  DEFAULT_RUNTIME_CONFIG,
  DEFAULT_LOGGING_CONFIG,
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_FILES,
  configFromEnv,
  configFromFile,
  configFromObject,
  mergeConfigs,
  loadConfig,
  parseSimpleYaml,
  validateConfig,
  assertValidConfig,
} from "./config";
