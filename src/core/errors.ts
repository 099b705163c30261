/**
 * Backup error kinds
 */

export type BackupErrorKind =
  | "invalid_expression"
  | "permission_denied"
  | "io_error"
  | "name_collision"
  | "deletion_failure"
  | "busy";

export interface BackupErrorOptions {
  path?: string;
  cause?: unknown;
}

export class BackupError extends Error {
  readonly kind: BackupErrorKind;
  readonly path?: string;

  constructor(kind: BackupErrorKind, message: string, options: BackupErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "BackupError";
    this.kind = kind;
    this.path = options.path;
  }
}

export function errorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    return typeof error.code === "string" ? error.code : undefined;
  }
  return undefined;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
