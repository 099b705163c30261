/**
 * Administrator lookup for manual triggers
 */

import * as os from "node:os";
import type { AutoBackupConfig } from "../types";

export function currentUser(): string {
  try {
    return os.userInfo().username;
  } catch {
    // No passwd entry for the uid, e.g. in some containers
    return process.env.USER ?? process.env.USERNAME ?? "";
  }
}

/**
 * With no `admins` configured every local operator counts as an
 * administrator; otherwise the user must be listed.
 */
export function isAdministrator(config: AutoBackupConfig, user: string): boolean {
  if (config.admins.length === 0) return true;
  return config.admins.includes(user);
}
