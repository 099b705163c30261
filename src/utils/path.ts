/**
 * Path validation and manipulation utilities
 */

import * as path from "node:path";

/**
 * Check if a file path is within (or equal to) a directory.
 */
export function isPathWithinDir(filePath: string, allowedDir: string): boolean {
  const normalizedPath = path.resolve(filePath);
  const normalizedDir = path.resolve(allowedDir);

  return normalizedPath.startsWith(normalizedDir + path.sep) || normalizedPath === normalizedDir;
}

/**
 * Archive entry name for a path under the source root: relative, `/`-separated.
 */
export function toArchiveEntryName(sourceRoot: string, filePath: string): string {
  return path.relative(sourceRoot, filePath).split(path.sep).join("/");
}
