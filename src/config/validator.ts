/**
 * Configuration validation
 */

import { BackupError } from "../core/errors";
import { parseCron } from "../core/scheduler/cron-parser";
import type { AutoBackupConfigFile } from "../types";
import { logger } from "../utils/logger";
import { ARCHIVE_PREFIX_PATTERN } from "../utils/naming";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

type Validator = (config: Record<string, unknown>) => void;

function optionalString(key: string): Validator {
  return (c) => {
    if (c[key] !== undefined && typeof c[key] !== "string") {
      throw new ConfigError(`${key} must be a string`);
    }
  };
}

function optionalStringArray(key: string): Validator {
  return (c) => {
    const value = c[key];
    if (value === undefined) return;
    if (!Array.isArray(value)) {
      throw new ConfigError(`${key} must be an array of strings`);
    }
    for (const [i, item] of value.entries()) {
      if (typeof item !== "string") {
        throw new ConfigError(`${key}[${i}] must be a string`);
      }
    }
  };
}

function optionalInteger(key: string, min: number, max = Number.MAX_SAFE_INTEGER): Validator {
  return (c) => {
    const value = c[key];
    if (value === undefined) return;
    if (typeof value !== "number" || !Number.isInteger(value) || value < min || value > max) {
      const range = max === Number.MAX_SAFE_INTEGER ? `>= ${min}` : `between ${min} and ${max}`;
      throw new ConfigError(`${key} must be an integer ${range}`);
    }
  };
}

const validators: Record<keyof AutoBackupConfigFile, Validator> = {
  source_path: optionalString("source_path"),

  backup_path: optionalString("backup_path"),

  cron_expression: (c) => {
    optionalString("cron_expression")(c);
    if (typeof c.cron_expression !== "string") return;
    try {
      parseCron(c.cron_expression);
    } catch (error) {
      if (error instanceof BackupError) {
        throw new ConfigError(`cron_expression: ${error.message}`);
      }
      throw error;
    }
  },

  max_backups: optionalInteger("max_backups", 1),

  exclude_dirs: optionalStringArray("exclude_dirs"),

  exclude_extensions: optionalStringArray("exclude_extensions"),

  archive_prefix: (c) => {
    optionalString("archive_prefix")(c);
    if (typeof c.archive_prefix === "string" && !ARCHIVE_PREFIX_PATTERN.test(c.archive_prefix)) {
      throw new ConfigError("archive_prefix may only contain lowercase letters, digits and hyphens");
    }
  },

  compression: optionalInteger("compression", 0, 9),

  admins: optionalStringArray("admins"),
};

/**
 * Validate a configuration object
 */
export function validateConfig(config: unknown): asserts config is AutoBackupConfigFile {
  if (!config || typeof config !== "object" || Array.isArray(config)) {
    throw new ConfigError("Config must be an object");
  }

  const c = Object.fromEntries(Object.entries(config));

  for (const key of Object.keys(c)) {
    if (!(key in validators)) {
      logger.warn(`Ignoring unknown config key: ${key}`);
    }
  }

  for (const validate of Object.values(validators)) {
    validate(c);
  }
}
