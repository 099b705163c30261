/**
 * Centralized type exports for autobackup
 */

// Backup types
export type {
  ArchiveFailure,
  ArchiveResult,
  ArchiveSuccess,
  ArchiveTask,
  BackupFileRecord,
  BackupRunResult,
  BackupRunSuccess,
  CleanupRunResult,
  DeletionFailure,
  ExclusionRuleSet,
  RetentionResult,
  TriggerOrigin,
  TriggerRequest,
} from "./backup";
// Config types
export type {
  ArchiveConfig,
  AutoBackupConfig,
  AutoBackupConfigFile,
  ExclusionConfig,
  RetentionConfig,
} from "./config";
