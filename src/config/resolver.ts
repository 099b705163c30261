/**
 * Configuration path resolution
 */

import * as path from "node:path";
import type { AutoBackupConfig, AutoBackupConfigFile } from "../types";

/**
 * Turn validated file values into the runtime config. Relative paths are
 * resolved against `baseDir` (the config file's directory). An empty
 * `backup_path` places backups one level above the source directory.
 */
export function resolveConfig(
  file: Required<AutoBackupConfigFile>,
  baseDir: string,
): AutoBackupConfig {
  const sourcePath = path.resolve(baseDir, file.source_path || ".");
  const backupPath = file.backup_path
    ? path.resolve(baseDir, file.backup_path)
    : path.dirname(sourcePath);

  return {
    sourcePath,
    backupPath,
    cronExpression: file.cron_expression.trim(),
    retention: { maxBackups: file.max_backups },
    exclude: {
      directories: [...file.exclude_dirs],
      extensions: [...file.exclude_extensions],
    },
    archive: {
      prefix: file.archive_prefix,
      compression: file.compression,
    },
    admins: [...file.admins],
  };
}
