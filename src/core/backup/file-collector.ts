/**
 * Source tree walking for backup archives
 */

import type { Dirent } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { toArchiveEntryName } from "../../utils/path";
import { logger } from "../../utils/logger";
import { BackupError, errorCode, errorMessage } from "../errors";
import type { PathFilter } from "./path-filter";

export interface CollectedFile {
  absolutePath: string;
  /** `/`-separated path relative to the source root */
  relativePath: string;
}

export interface CollectOptions {
  filter: PathFilter;
  /** Files to leave out regardless of the filter, e.g. the archive being written */
  skip?: (absolutePath: string) => boolean;
  /** Called for entries that vanished or could not be inspected mid-walk */
  onSkipped?: (absolutePath: string, error: unknown) => void;
}

async function readDirectory(dirPath: string): Promise<Dirent[]> {
  return fs.readdir(dirPath, { withFileTypes: true });
}

/**
 * Walk the source tree depth-first, yielding every file the filter admits.
 * Excluded directories are never descended into and symlinked directories
 * are not followed.
 */
export async function* collectFiles(
  sourceRoot: string,
  options: CollectOptions,
): AsyncGenerator<CollectedFile> {
  const root = path.resolve(sourceRoot);
  const pending: string[] = [root];

  while (pending.length > 0) {
    const dirPath = pending.pop();
    if (dirPath === undefined) break;

    let entries: Dirent[];
    try {
      entries = await readDirectory(dirPath);
    } catch (error) {
      // A subdirectory removed while walking is the same race as a vanished file
      if (dirPath !== root && errorCode(error) === "ENOENT") {
        options.onSkipped?.(dirPath, error);
        continue;
      }
      throw new BackupError("io_error", `Failed to read directory ${dirPath}: ${errorMessage(error)}`, {
        path: dirPath,
        cause: error,
      });
    }

    entries.sort((a, b) => a.name.localeCompare(b.name));

    for (const entry of entries) {
      const absolutePath = path.join(dirPath, entry.name);
      let isDirectory = entry.isDirectory();
      let isFile = entry.isFile();

      if (entry.isSymbolicLink()) {
        try {
          const target = await fs.stat(absolutePath);
          if (target.isDirectory()) {
            logger.debug(`Not following symlinked directory: ${absolutePath}`);
            continue;
          }
          isDirectory = false;
          isFile = target.isFile();
        } catch (error) {
          options.onSkipped?.(absolutePath, error);
          continue;
        }
      }

      if (isDirectory) {
        if (options.filter.shouldExclude(absolutePath, true)) {
          logger.debug(`Excluding directory: ${absolutePath}`);
          continue;
        }
        pending.push(absolutePath);
        continue;
      }

      if (!isFile) {
        logger.debug(`Skipping special file: ${absolutePath}`);
        continue;
      }

      if (options.filter.shouldExclude(absolutePath, false)) continue;
      if (options.skip?.(absolutePath)) continue;

      yield { absolutePath, relativePath: toArchiveEntryName(root, absolutePath) };
    }
  }
}
