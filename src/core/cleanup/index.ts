/**
 * Cleanup module exports
 */

export { type CleanupOptions, enforceRetention } from "./orchestrator";
export { getCleanupCandidates, listBackups, readBackupFiles } from "./retention";
export { type ValidationResult, validateDeletionCandidate } from "./validator";
