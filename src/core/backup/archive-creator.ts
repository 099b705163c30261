/**
 * Archive creation for backups
 */

import { once } from "node:events";
import type { ReadStream } from "node:fs";
import type { FileHandle } from "node:fs/promises";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { pipeline } from "node:stream/promises";
import archiver from "archiver";
import type { ArchiveFailure, ArchiveResult, ArchiveTask } from "../../types";
import { logger } from "../../utils/logger";
import { DEFAULT_ARCHIVE_PREFIX, generateArchiveName, isValidArchiveName } from "../../utils/naming";
import { BackupError, errorCode, errorMessage } from "../errors";
import { collectFiles } from "./file-collector";
import { createExclusionRules, PathFilter } from "./path-filter";

export const DEFAULT_COMPRESSION = 6;

export interface ArchiveOptions {
  prefix?: string;
  compression?: number;
  /** Clock used for the archive name */
  now?: () => Date;
}

interface EntryCounts {
  filesCount: number;
  skippedCount: number;
}

export function createArchiveTask(
  sourceRoot: string,
  destinationDir: string,
  filter: PathFilter = new PathFilter(createExclusionRules()),
  options: ArchiveOptions = {},
): ArchiveTask {
  const now = options.now?.() ?? new Date();

  return {
    sourceRoot: path.resolve(sourceRoot),
    destinationDir: path.resolve(destinationDir),
    rules: filter.rules,
    archiveName: generateArchiveName(now, options.prefix ?? DEFAULT_ARCHIVE_PREFIX),
  };
}

/**
 * Archive `sourceRoot` into a freshly named zip inside `destinationDir`.
 */
export async function buildArchive(
  sourceRoot: string,
  destinationDir: string,
  filter: PathFilter,
  options: ArchiveOptions = {},
): Promise<ArchiveResult> {
  return createArchive(createArchiveTask(sourceRoot, destinationDir, filter, options), options);
}

export async function createArchive(
  task: ArchiveTask,
  options: ArchiveOptions = {},
): Promise<ArchiveResult> {
  const startTime = Date.now();
  const archivePath = path.join(task.destinationDir, task.archiveName);

  const fail = (error: BackupError): ArchiveFailure => {
    logger.error(`Archive creation failed: ${error.message}`, {
      operation: "createArchive",
      kind: error.kind,
      path: error.path,
      cause: error.cause,
    });
    return { success: false, error, durationMs: Date.now() - startTime };
  };

  try {
    await assertSourceRoot(task.sourceRoot);
  } catch (error) {
    return fail(toBackupError(error, task.sourceRoot));
  }

  logger.info(`Creating archive ${task.archiveName} from ${task.sourceRoot}`);

  const unwritable = (error: unknown) =>
    fail(
      new BackupError(
        "io_error",
        `Destination directory is not writable: ${task.destinationDir} (${errorMessage(error)})`,
        { path: task.destinationDir, cause: error },
      ),
    );

  try {
    await fs.mkdir(task.destinationDir, { recursive: true });
  } catch (error) {
    return unwritable(error);
  }

  let output: FileHandle;
  try {
    output = await fs.open(archivePath, "wx");
  } catch (error) {
    if (errorCode(error) === "EEXIST") {
      return fail(
        new BackupError("name_collision", `Archive already exists: ${archivePath}`, {
          path: archivePath,
          cause: error,
        }),
      );
    }
    return unwritable(error);
  }

  try {
    const counts = await writeEntries(output, task, archivePath, options);
    const { size } = await fs.stat(archivePath);
    const durationMs = Date.now() - startTime;

    logger.info(
      `Archive created: ${task.archiveName} (${size} bytes, ${counts.filesCount} files, ${counts.skippedCount} skipped)`,
    );

    return {
      success: true,
      archiveName: task.archiveName,
      archivePath,
      sizeBytes: size,
      durationMs,
      ...counts,
    };
  } catch (error) {
    await removePartialArchive(archivePath);
    return fail(toBackupError(error, archivePath));
  }
}

async function assertSourceRoot(sourceRoot: string): Promise<void> {
  const stats = await fs.stat(sourceRoot).catch((error: unknown) => {
    throw new BackupError("io_error", `Source path does not exist: ${sourceRoot}`, {
      path: sourceRoot,
      cause: error,
    });
  });
  if (!stats.isDirectory()) {
    throw new BackupError("io_error", `Source path is not a directory: ${sourceRoot}`, {
      path: sourceRoot,
    });
  }
}

/**
 * Stream every admitted file into the zip, one open source file at a time.
 */
async function writeEntries(
  output: FileHandle,
  task: ArchiveTask,
  archivePath: string,
  options: ArchiveOptions,
): Promise<EntryCounts> {
  const prefix = options.prefix ?? DEFAULT_ARCHIVE_PREFIX;
  const archive = archiver("zip", {
    zlib: { level: options.compression ?? DEFAULT_COMPRESSION },
  });

  let streamError: unknown = null;
  const written = pipeline(archive, output.createWriteStream()).catch((error: unknown) => {
    streamError = error;
  });

  archive.on("warning", (warning) => {
    logger.warn(`Archive warning: ${warning.message}`);
  });

  const counts: EntryCounts = { filesCount: 0, skippedCount: 0 };
  const onSkipped = (entryPath: string, error: unknown) => {
    counts.skippedCount++;
    logger.warn(`Skipping unreadable entry: ${entryPath}`, error);
  };

  // Never archive the output itself, nor earlier backups sitting in the destination
  const skip = (absolutePath: string) =>
    absolutePath === archivePath ||
    (path.dirname(absolutePath) === task.destinationDir &&
      isValidArchiveName(path.basename(absolutePath), prefix));

  let entryStream: ReadStream | null = null;
  try {
    const files = collectFiles(task.sourceRoot, {
      filter: new PathFilter(task.rules),
      skip,
      onSkipped,
    });

    for await (const file of files) {
      const source = await openSource(file.absolutePath, onSkipped);
      if (!source) continue;

      const stream = source.handle.createReadStream();
      entryStream = stream;
      // The archiver pipes entries without forwarding their errors
      const readFailed = new Promise<never>((_, reject) => {
        stream.once("error", (error) => {
          reject(
            new BackupError("io_error", `Failed to read ${file.absolutePath}: ${error.message}`, {
              path: file.absolutePath,
              cause: error,
            }),
          );
        });
      });

      archive.append(stream, {
        name: file.relativePath,
        date: source.modifiedAt,
        mode: source.mode,
      });

      await Promise.race([once(archive, "entry"), written, readFailed]);
      if (streamError) throw streamError;
      counts.filesCount++;
    }

    await Promise.race([archive.finalize(), written]);
    await written;
    if (streamError) throw streamError;
  } catch (error) {
    // abort() waits for the current entry, which never ends after a read error
    if (!streamError) archive.destroy();
    entryStream?.destroy();
    await written;
    throw error;
  }

  return counts;
}

interface OpenedSource {
  handle: FileHandle;
  modifiedAt: Date;
  mode: number;
}

async function openSource(
  filePath: string,
  onSkipped: (entryPath: string, error: unknown) => void,
): Promise<OpenedSource | null> {
  let handle: FileHandle;
  try {
    handle = await fs.open(filePath, "r");
  } catch (error) {
    onSkipped(filePath, error);
    return null;
  }

  try {
    const stats = await handle.stat();
    return { handle, modifiedAt: stats.mtime, mode: stats.mode };
  } catch (error) {
    await handle.close();
    onSkipped(filePath, error);
    return null;
  }
}

async function removePartialArchive(archivePath: string): Promise<void> {
  try {
    await fs.rm(archivePath, { force: true });
    logger.debug(`Removed partial archive: ${archivePath}`);
  } catch (error) {
    logger.error(`Failed to remove partial archive: ${archivePath}`, error);
  }
}

function toBackupError(error: unknown, fallbackPath: string): BackupError {
  if (error instanceof BackupError) return error;

  return new BackupError("io_error", `Failed to write archive: ${errorMessage(error)}`, {
    path: fallbackPath,
    cause: error,
  });
}
