/**
 * Default configuration values
 */

import type { AutoBackupConfigFile } from "../types";
import { DEFAULT_ARCHIVE_PREFIX } from "../utils/naming";

export const DEFAULT_CRON_EXPRESSION = "0 0 */7 * *";
export const DEFAULT_MAX_BACKUPS = 5;

export const DEFAULT_CONFIG: Required<AutoBackupConfigFile> = {
  // Empty source_path means the directory holding the config file
  source_path: "",
  backup_path: "",
  cron_expression: DEFAULT_CRON_EXPRESSION,
  max_backups: DEFAULT_MAX_BACKUPS,
  exclude_dirs: [],
  exclude_extensions: [],
  archive_prefix: DEFAULT_ARCHIVE_PREFIX,
  compression: 6,
  admins: [],
};

/**
 * Layer config sources, later ones winning. Keys left undefined do not
 * override earlier values and unknown keys are dropped.
 */
export function mergeConfig(
  base: Required<AutoBackupConfigFile>,
  ...overrides: AutoBackupConfigFile[]
): Required<AutoBackupConfigFile> {
  const result = { ...base };

  for (const override of overrides) {
    for (const [key, value] of Object.entries(override)) {
      if (value !== undefined && key in result) {
        Object.assign(result, { [key]: value });
      }
    }
  }

  return result;
}
