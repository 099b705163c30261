/**
 * Configuration file loading
 */

import * as fs from "node:fs";
import * as path from "node:path";
import * as yaml from "js-yaml";
import { errorCode, errorMessage } from "../core/errors";
import type { AutoBackupConfig } from "../types";
import { logger } from "../utils/logger";
import { DEFAULT_CONFIG, mergeConfig } from "./defaults";
import { type InlineConfigOptions, mergeInlineConfig } from "./inline";
import { resolveConfig } from "./resolver";
import { ConfigError, validateConfig } from "./validator";

// Re-export inline config utilities
export {
  buildInlineConfig,
  extractInlineOptions,
  hasInlineOptions,
  INLINE_CONFIG_OPTIONS,
  type InlineConfigOptions,
  mergeInlineConfig,
} from "./inline";
export { ConfigError } from "./validator";

export const CONFIG_FILE_NAMES = [
  "autobackup.config.yaml",
  "autobackup.config.yml",
  "autobackup.config.json",
] as const;

/**
 * Build the runtime config from parsed file content, defaults and inline
 * overrides.
 */
export function buildConfig(
  parsed: unknown,
  baseDir: string,
  inline: InlineConfigOptions = {},
): AutoBackupConfig {
  validateConfig(parsed);

  const merged = mergeInlineConfig(mergeConfig(DEFAULT_CONFIG, parsed), inline);

  // Inline values have not been checked yet
  validateConfig(merged);

  return resolveConfig(merged, baseDir);
}

/**
 * Load and parse a config file
 */
export async function loadConfig(
  configPath: string,
  inline: InlineConfigOptions = {},
): Promise<AutoBackupConfig> {
  const absolutePath = path.resolve(configPath);

  let content: string;
  try {
    content = await fs.promises.readFile(absolutePath, "utf8");
  } catch (error) {
    if (errorCode(error) === "ENOENT") {
      throw new ConfigError(`Config file not found: ${absolutePath}`);
    }
    throw new ConfigError(`Failed to read config file ${absolutePath}: ${errorMessage(error)}`);
  }

  const ext = path.extname(absolutePath).toLowerCase();
  const parsed = parseConfigContent(content, ext);

  logger.debug(`Loaded config from ${absolutePath}`);

  return buildConfig(parsed, path.dirname(absolutePath), inline);
}

function parseConfigContent(content: string, ext: string): unknown {
  if (ext === ".yaml" || ext === ".yml") {
    try {
      // An empty file means "all defaults"
      return yaml.load(content) ?? {};
    } catch (e) {
      throw new ConfigError(`Failed to parse YAML: ${errorMessage(e)}`);
    }
  }

  if (ext === ".json") {
    try {
      return JSON.parse(content);
    } catch (e) {
      throw new ConfigError(`Failed to parse JSON: ${errorMessage(e)}`);
    }
  }

  throw new ConfigError(`Unsupported config file format: ${ext}. Use .yaml, .yml, or .json`);
}

/**
 * Find a config file in the given directory
 */
export function findConfigFile(startDir: string = process.cwd()): string | null {
  for (const name of CONFIG_FILE_NAMES) {
    const configPath = path.join(startDir, name);
    if (fs.existsSync(configPath)) {
      return configPath;
    }
  }

  return null;
}

/**
 * Load the given config file, or the one in the working directory. Without
 * either, defaults plus inline options are used with the working directory
 * as the source.
 */
export async function findAndLoadConfig(
  configPath?: string,
  inline: InlineConfigOptions = {},
  cwd: string = process.cwd(),
): Promise<AutoBackupConfig> {
  if (configPath) {
    return loadConfig(configPath, inline);
  }

  const found = findConfigFile(cwd);
  if (found) {
    return loadConfig(found, inline);
  }

  logger.debug("No config file found, using defaults");
  return buildConfig({}, cwd, inline);
}
