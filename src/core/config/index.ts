// src/core/config/index.ts
// Configuration system exports

export {
  type NewLine,
  type CompilerConfig,
  type FormatConfig,
  type LogConfig,
  type LispenConfig,
  type PartialConfig,
  type ConfigValidation,
  DEFAULT_COMPILER_CONFIG,
  DEFAULT_FORMAT_CONFIG,
  DEFAULT_LOG_CONFIG,
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_FILES,
  ConfigError,
  configFromEnv,
  configFromFile,
  configFromObject,
  mergeConfigs,
  loadConfig,
  parseSimpleYaml,
  validateConfig,
} from "./config";
