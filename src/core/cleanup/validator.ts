/**
 * Backup deletion validation
 */

import type { BackupFileRecord } from "../../types";
import { isValidArchiveName } from "../../utils/naming";
import { isPathWithinDir } from "../../utils/path";

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

/**
 * Last check before a file is unlinked: it must carry our naming pattern and
 * live inside the destination directory.
 */
export function validateDeletionCandidate(
  backup: BackupFileRecord,
  destinationDir: string,
  prefix: string,
): ValidationResult {
  const errors: string[] = [];

  if (!isValidArchiveName(backup.fileName, prefix)) {
    errors.push(
      `Archive name "${backup.fileName}" doesn't match the ${prefix} pattern - refusing to delete`,
    );
  }

  if (!isPathWithinDir(backup.path, destinationDir)) {
    errors.push(
      `Path "${backup.path}" is outside backup directory "${destinationDir}" - refusing to delete`,
    );
  }

  return { valid: errors.length === 0, errors };
}
