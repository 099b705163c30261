/**
 * Backup operation type definitions
 */

import type { BackupError } from "../core/errors";

export interface ExclusionRuleSet {
  directories: ReadonlySet<string>;
  extensions: readonly string[];
}

export interface ArchiveTask {
  sourceRoot: string;
  destinationDir: string;
  rules: ExclusionRuleSet;
  archiveName: string;
}

export interface ArchiveSuccess {
  success: true;
  archiveName: string;
  archivePath: string;
  /** Size of the compressed archive on disk */
  sizeBytes: number;
  durationMs: number;
  filesCount: number;
  /** Entries that could not be read and were left out */
  skippedCount: number;
}

export interface ArchiveFailure {
  success: false;
  error: BackupError;
  durationMs: number;
}

export type ArchiveResult = ArchiveSuccess | ArchiveFailure;

export interface BackupFileRecord {
  fileName: string;
  path: string;
  sizeBytes: number;
  modifiedAt: Date;
}

export interface DeletionFailure {
  fileName: string;
  path: string;
  error: string;
}

export interface RetentionResult {
  deleted: string[];
  failures: DeletionFailure[];
}

export interface BackupRunSuccess extends ArchiveSuccess {
  retention: RetentionResult;
  warnings: string[];
}

export type BackupRunResult = BackupRunSuccess | ArchiveFailure;

export type CleanupRunResult =
  | { success: true; retention: RetentionResult }
  | { success: false; error: BackupError };

export type TriggerOrigin = "manual" | "scheduled";

export interface TriggerRequest {
  /** Supplied by the host's permission lookup */
  isAdmin: boolean;
  origin?: TriggerOrigin;
}
