/**
 * Retention policy logic
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { BackupFileRecord } from "../../types";
import { DEFAULT_ARCHIVE_PREFIX, isValidArchiveName } from "../../utils/naming";
import { BackupError, errorCode, errorMessage } from "../errors";

function compareOldestFirst(a: BackupFileRecord, b: BackupFileRecord): number {
  const byTime = a.modifiedAt.getTime() - b.modifiedAt.getTime();
  if (byTime !== 0) return byTime;
  return a.fileName < b.fileName ? -1 : a.fileName > b.fileName ? 1 : 0;
}

/**
 * Read the backup archives in a directory, oldest first. Only files matching
 * the archive naming pattern are returned. Always hits the filesystem.
 */
export async function readBackupFiles(
  destinationDir: string,
  prefix: string = DEFAULT_ARCHIVE_PREFIX,
): Promise<BackupFileRecord[]> {
  const dir = path.resolve(destinationDir);

  let names: string[];
  try {
    names = await fs.readdir(dir);
  } catch (error) {
    if (errorCode(error) === "ENOENT") return [];
    throw new BackupError("io_error", `Failed to list backups in ${dir}: ${errorMessage(error)}`, {
      path: dir,
      cause: error,
    });
  }

  const records: BackupFileRecord[] = [];
  for (const fileName of names.filter((name) => isValidArchiveName(name, prefix))) {
    const filePath = path.join(dir, fileName);
    try {
      const stats = await fs.stat(filePath);
      if (!stats.isFile()) continue;
      records.push({ fileName, path: filePath, sizeBytes: stats.size, modifiedAt: stats.mtime });
    } catch (error) {
      // Deleted between readdir and stat
      if (errorCode(error) === "ENOENT") continue;
      throw new BackupError("io_error", `Failed to stat ${filePath}: ${errorMessage(error)}`, {
        path: filePath,
        cause: error,
      });
    }
  }

  return records.sort(compareOldestFirst);
}

/**
 * Backups newest first, as shown to operators.
 */
export async function listBackups(
  destinationDir: string,
  prefix: string = DEFAULT_ARCHIVE_PREFIX,
): Promise<BackupFileRecord[]> {
  const records = await readBackupFiles(destinationDir, prefix);
  return records.reverse();
}

/**
 * Get backups eligible for cleanup: everything but the newest `maxBackups`.
 */
export function getCleanupCandidates(
  backups: BackupFileRecord[],
  maxBackups: number,
): BackupFileRecord[] {
  const sorted = [...backups].sort(compareOldestFirst);
  const surplus = sorted.length - maxBackups;

  return surplus > 0 ? sorted.slice(0, surplus) : [];
}
