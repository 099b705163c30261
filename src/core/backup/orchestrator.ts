/**
 * Backup orchestration
 */

import * as path from "node:path";
import type {
  ArchiveFailure,
  ArchiveTask,
  AutoBackupConfig,
  BackupFileRecord,
  BackupRunResult,
  CleanupRunResult,
  RetentionResult,
  TriggerRequest,
} from "../../types";
import { logger } from "../../utils/logger";
import { formatBytes, formatDuration } from "../../utils/format";
import { enforceRetention, listBackups } from "../cleanup";
import { BackupError, errorMessage } from "../errors";
import { createArchive, createArchiveTask } from "./archive-creator";
import { createExclusionRules, PathFilter } from "./path-filter";

export interface OrchestratorOptions {
  /** Clock used for archive names */
  now?: () => Date;
}

/**
 * Runs backups for one configuration. At most one run per destination
 * directory is in flight; a second trigger is turned away as `busy`.
 */
export class BackupOrchestrator {
  private readonly inFlight = new Set<string>();

  constructor(
    private readonly config: AutoBackupConfig,
    private readonly options: OrchestratorOptions = {},
  ) {}

  createTask(): ArchiveTask {
    const filter = new PathFilter(createExclusionRules(this.config.exclude));
    return createArchiveTask(this.config.sourcePath, this.config.backupPath, filter, {
      prefix: this.config.archive.prefix,
      now: this.options.now,
    });
  }

  /**
   * Manual and scheduled entry point. The caller's administrator status comes
   * from the host; a non-admin gets a `permission_denied` result.
   */
  async trigger(request: TriggerRequest): Promise<BackupRunResult> {
    const origin = request.origin ?? "manual";

    if (!request.isAdmin) {
      const error = new BackupError("permission_denied", "Only administrators can trigger a backup");
      logger.warn(`Rejected ${origin} backup trigger: ${error.message}`);
      return { success: false, error, durationMs: 0 };
    }

    logger.info(`Starting ${origin} backup`);
    return this.runBackup();
  }

  async runBackup(task: ArchiveTask = this.createTask()): Promise<BackupRunResult> {
    const destination = path.resolve(task.destinationDir);

    if (this.inFlight.has(destination)) {
      return this.busy(destination);
    }

    this.inFlight.add(destination);
    try {
      const archive = await createArchive(task, {
        prefix: this.config.archive.prefix,
        compression: this.config.archive.compression,
      });

      // Retention never runs after a failed archive
      if (!archive.success) {
        return archive;
      }

      const warnings: string[] = [];
      let retention: RetentionResult = { deleted: [], failures: [] };

      try {
        retention = await enforceRetention(destination, this.config.retention.maxBackups, {
          prefix: this.config.archive.prefix,
        });
      } catch (error) {
        const message = `Retention cleanup failed: ${errorMessage(error)}`;
        logger.warn(message, { operation: "enforceRetention", path: destination });
        warnings.push(message);
      }

      for (const failure of retention.failures) {
        warnings.push(`Failed to delete ${failure.fileName}: ${failure.error}`);
      }
      if (archive.skippedCount > 0) {
        warnings.push(`${archive.skippedCount} unreadable file(s) were skipped`);
      }

      logger.info(
        `Backup completed in ${formatDuration(archive.durationMs)}: ${archive.archiveName} (${formatBytes(archive.sizeBytes)})`,
      );

      return { ...archive, retention, warnings };
    } finally {
      this.inFlight.delete(destination);
    }
  }

  /**
   * Run retention on its own, under the same guard as a backup.
   */
  async cleanup(options: { dryRun?: boolean } = {}): Promise<CleanupRunResult> {
    const destination = path.resolve(this.config.backupPath);

    if (this.inFlight.has(destination)) {
      return this.busy(destination);
    }

    this.inFlight.add(destination);
    try {
      const retention = await enforceRetention(destination, this.config.retention.maxBackups, {
        prefix: this.config.archive.prefix,
        dryRun: options.dryRun,
      });
      return { success: true, retention };
    } catch (error) {
      const failure =
        error instanceof BackupError
          ? error
          : new BackupError("io_error", `Retention cleanup failed: ${errorMessage(error)}`, {
              path: destination,
              cause: error,
            });
      logger.error(failure.message, { operation: "cleanup", path: destination });
      return { success: false, error: failure };
    } finally {
      this.inFlight.delete(destination);
    }
  }

  /**
   * Current backups in the destination, newest first. Read-only.
   */
  async status(destinationDir: string = this.config.backupPath): Promise<BackupFileRecord[]> {
    return listBackups(destinationDir, this.config.archive.prefix);
  }

  isRunning(destinationDir?: string): boolean {
    if (destinationDir === undefined) return this.inFlight.size > 0;
    return this.inFlight.has(path.resolve(destinationDir));
  }

  private busy(destination: string): ArchiveFailure {
    const error = new BackupError("busy", `A backup is already running for ${destination}`, {
      path: destination,
    });
    logger.warn(`Backup rejected: ${error.message}`);
    return { success: false, error, durationMs: 0 };
  }
}
