/**
 * Configuration module exports
 */

// Defaults
export { DEFAULT_CONFIG, DEFAULT_CRON_EXPRESSION, DEFAULT_MAX_BACKUPS, mergeConfig } from "./defaults";
// Inline options
export {
  buildInlineConfig,
  extractInlineOptions,
  hasInlineOptions,
  INLINE_CONFIG_OPTIONS,
  type InlineConfigOptions,
  mergeInlineConfig,
} from "./inline";
// Loader
export { buildConfig, CONFIG_FILE_NAMES, findAndLoadConfig, findConfigFile, loadConfig } from "./loader";
// Resolver
export { resolveConfig } from "./resolver";
// Validator
export { ConfigError, validateConfig } from "./validator";
