/**
 * Configuration module exports
 */

// Defaults
export { DEFAULT_CONFIG, deepMerge } from "./defaults";
// Inline options
export {
  buildInlineConfig,
  createConfigFromInlineOptions,
  extractInlineOptions,
  hasInlineOptions,
  INLINE_CONFIG_OPTIONS,
  type InlineConfigOptions,
  type InlineConfigValues,
  mergeInlineConfig,
} from "./inline";
// Loader
export { CONFIG_FILE_NAMES, findAndLoadConfig, findConfigFile, loadConfig } from "./loader";
// Resolver
export { resolvePaths, toBackupConfig } from "./resolver";
// Validator
export { ConfigError, validateConfig } from "./validator";
