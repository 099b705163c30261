/**
 * Inline configuration parsing and merging utilities
 */

import * as path from "node:path";
import type { AutoBackupConfigFile } from "../types";
import { mergeConfig } from "./defaults";

/**
 * Inline configuration options that can be passed via CLI flags
 */
export interface InlineConfigOptions {
  /** Directory to back up */
  source?: string;
  /** Directory the archives are written to */
  backupPath?: string;
  /** Cron expression for the scheduler */
  cron?: string;
  /** Number of archives to keep */
  maxBackups?: number;
  /** Extra directory names to exclude (can be repeated) */
  excludeDir?: string[];
  /** Extra file suffixes to exclude (can be repeated) */
  excludeExt?: string[];
  /** Compression level (0-9) */
  compression?: number;
}

/**
 * `parseArgs` option definitions shared by every command that loads config
 */
export const INLINE_CONFIG_OPTIONS = {
  source: { type: "string" },
  "backup-path": { type: "string" },
  cron: { type: "string" },
  "max-backups": { type: "string" },
  "exclude-dir": { type: "string", multiple: true },
  "exclude-ext": { type: "string", multiple: true },
  compression: { type: "string" },
} as const;

function stringValue(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function numberValue(value: unknown): number | undefined {
  if (typeof value !== "string") return undefined;
  // Non-numeric input becomes NaN and is reported by the validator
  return value.trim() === "" ? Number.NaN : Number(value);
}

function stringListValue(value: unknown): string[] | undefined {
  if (!Array.isArray(value)) return undefined;
  return value.filter((item): item is string => typeof item === "string");
}

/**
 * Pick the inline options out of `parseArgs` values
 */
export function extractInlineOptions(values: Record<string, unknown>): InlineConfigOptions {
  return {
    source: stringValue(values.source),
    backupPath: stringValue(values["backup-path"]),
    cron: stringValue(values.cron),
    maxBackups: numberValue(values["max-backups"]),
    excludeDir: stringListValue(values["exclude-dir"]),
    excludeExt: stringListValue(values["exclude-ext"]),
    compression: numberValue(values.compression),
  };
}

export function hasInlineOptions(options: InlineConfigOptions): boolean {
  return Object.values(options).some((value) => value !== undefined);
}

/**
 * Build a partial config from inline options. Paths are resolved against the
 * working directory, not the config file.
 */
export function buildInlineConfig(
  options: InlineConfigOptions,
  cwd: string = process.cwd(),
): AutoBackupConfigFile {
  const config: AutoBackupConfigFile = {};

  if (options.source) {
    config.source_path = path.resolve(cwd, options.source);
  }
  if (options.backupPath) {
    config.backup_path = path.resolve(cwd, options.backupPath);
  }
  if (options.cron !== undefined) {
    config.cron_expression = options.cron;
  }
  if (options.maxBackups !== undefined) {
    config.max_backups = options.maxBackups;
  }
  if (options.compression !== undefined) {
    config.compression = options.compression;
  }

  return config;
}

/**
 * Apply inline options on top of file values. Exclusion lists are appended
 * rather than replaced.
 */
export function mergeInlineConfig(
  file: Required<AutoBackupConfigFile>,
  options: InlineConfigOptions,
  cwd: string = process.cwd(),
): Required<AutoBackupConfigFile> {
  const merged = mergeConfig(file, buildInlineConfig(options, cwd));

  return {
    ...merged,
    exclude_dirs: [...file.exclude_dirs, ...(options.excludeDir ?? [])],
    exclude_extensions: [...file.exclude_extensions, ...(options.excludeExt ?? [])],
  };
}
