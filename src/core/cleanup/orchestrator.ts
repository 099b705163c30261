/**
 * Cleanup orchestration
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { DeletionFailure, RetentionResult } from "../../types";
import { logger } from "../../utils/logger";
import { DEFAULT_ARCHIVE_PREFIX } from "../../utils/naming";
import { BackupError, errorMessage } from "../errors";
import { getCleanupCandidates, readBackupFiles } from "./retention";
import { validateDeletionCandidate } from "./validator";

export interface CleanupOptions {
  prefix?: string;
  dryRun?: boolean;
}

/**
 * Delete the oldest backups until at most `maxBackups` remain. A failed delete
 * is recorded and the remaining candidates are still attempted.
 */
export async function enforceRetention(
  destinationDir: string,
  maxBackups: number,
  options: CleanupOptions = {},
): Promise<RetentionResult> {
  if (!Number.isInteger(maxBackups) || maxBackups < 1) {
    throw new RangeError(`maxBackups must be a positive integer, got ${maxBackups}`);
  }

  const prefix = options.prefix ?? DEFAULT_ARCHIVE_PREFIX;
  const dir = path.resolve(destinationDir);
  const backups = await readBackupFiles(dir, prefix);
  const candidates = getCleanupCandidates(backups, maxBackups);

  const result: RetentionResult = { deleted: [], failures: [] };

  if (candidates.length === 0) {
    logger.debug(`Retention: ${backups.length} backup(s) in ${dir}, limit ${maxBackups}, nothing to delete`);
    return result;
  }

  logger.info(`Retention: deleting ${candidates.length} of ${backups.length} backup(s) in ${dir}`);

  for (const backup of candidates) {
    const validation = validateDeletionCandidate(backup, dir, prefix);
    if (!validation.valid) {
      recordFailure(result.failures, backup.fileName, backup.path, validation.errors.join("; "));
      continue;
    }

    if (options.dryRun) {
      logger.info(`[DRY RUN] Would delete: ${backup.fileName}`);
      result.deleted.push(backup.fileName);
      continue;
    }

    try {
      await fs.unlink(backup.path);
      result.deleted.push(backup.fileName);
      logger.info(`Deleted old backup: ${backup.fileName}`);
    } catch (error) {
      recordFailure(result.failures, backup.fileName, backup.path, errorMessage(error));
    }
  }

  return result;
}

function recordFailure(
  failures: DeletionFailure[],
  fileName: string,
  filePath: string,
  reason: string,
): void {
  const failure = new BackupError("deletion_failure", `Failed to delete ${fileName}: ${reason}`, {
    path: filePath,
  });
  logger.warn(failure.message, { operation: "enforceRetention", kind: failure.kind, path: filePath });
  failures.push({ fileName, path: filePath, error: reason });
}
