/**
 * Configuration type definitions for autobackup
 */

/**
 * Configuration file shape. Keys are snake_case because host applications
 * write them directly (`backup_path`, `cron_expression`, `max_backups`).
 */
export interface AutoBackupConfigFile {
  source_path?: string;
  /** Empty string means one level above `source_path` */
  backup_path?: string;
  cron_expression?: string;
  max_backups?: number;
  exclude_dirs?: string[];
  exclude_extensions?: string[];
  archive_prefix?: string;
  compression?: number;
  /** User names allowed to trigger manual backups; empty allows every local operator */
  admins?: string[];
}

export interface ExclusionConfig {
  /** Extra directory names, added to the built-in set */
  directories: string[];
  /** Extra file-name suffixes, added to the built-in set */
  extensions: string[];
}

export interface ArchiveConfig {
  prefix: string;
  /** zlib level, 0-9 */
  compression: number;
}

export interface RetentionConfig {
  maxBackups: number;
}

export interface AutoBackupConfig {
  sourcePath: string;
  backupPath: string;
  cronExpression: string;
  retention: RetentionConfig;
  exclude: ExclusionConfig;
  archive: ArchiveConfig;
  admins: string[];
}
