/**
 * Backup module exports
 */

export {
  type ArchiveOptions,
  buildArchive,
  createArchive,
  createArchiveTask,
  DEFAULT_COMPRESSION,
} from "./archive-creator";
export { type CollectedFile, type CollectOptions, collectFiles } from "./file-collector";
export { BackupOrchestrator, type OrchestratorOptions } from "./orchestrator";
export {
  createExclusionRules,
  DEFAULT_EXCLUDED_DIRECTORIES,
  DEFAULT_EXCLUDED_EXTENSIONS,
  PathFilter,
} from "./path-filter";
