/**
 * Core module exports
 */

// Backup
export {
  type ArchiveOptions,
  BackupOrchestrator,
  buildArchive,
  type CollectedFile,
  collectFiles,
  createArchive,
  createArchiveTask,
  createExclusionRules,
  DEFAULT_EXCLUDED_DIRECTORIES,
  DEFAULT_EXCLUDED_EXTENSIONS,
  type OrchestratorOptions,
  PathFilter,
} from "./backup";

// Cleanup
export {
  type CleanupOptions,
  enforceRetention,
  getCleanupCandidates,
  listBackups,
  readBackupFiles,
  type ValidationResult,
  validateDeletionCandidate,
} from "./cleanup";

// Errors
export { BackupError, type BackupErrorKind } from "./errors";

// Scheduler
export {
  isDue,
  matchesCron,
  nextTrigger,
  type ParsedCron,
  parseCron,
  Scheduler,
  type SchedulerOptions,
  type SchedulerStatus,
} from "./scheduler";
