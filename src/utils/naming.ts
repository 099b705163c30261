/**
 * Archive naming utilities
 *
 * Archives are named `<prefix>_<YYYYMMDD>_<HHMMSS>.zip` using local time,
 * e.g. `backup_20250111_143022.zip`. Other tools rely on this exact pattern
 * to find backup artifacts.
 */

export const DEFAULT_ARCHIVE_PREFIX = "backup";
export const ARCHIVE_EXTENSION = ".zip";

export const ARCHIVE_PREFIX_PATTERN = /^[a-z0-9-]+$/;

export interface ParsedArchiveName {
  prefix: string;
  date: string;
  time: string;
  createdAt: Date;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export function archiveNamePattern(prefix: string = DEFAULT_ARCHIVE_PREFIX): RegExp {
  return new RegExp(`^(${escapeRegExp(prefix)})_(\\d{8})_(\\d{6})\\.zip$`);
}

const pad = (value: number) => String(value).padStart(2, "0");

export function generateArchiveName(
  now: Date = new Date(),
  prefix: string = DEFAULT_ARCHIVE_PREFIX,
): string {
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;

  return `${prefix}_${date}_${time}${ARCHIVE_EXTENSION}`;
}

export function parseArchiveName(
  archiveName: string,
  prefix: string = DEFAULT_ARCHIVE_PREFIX,
): ParsedArchiveName | null {
  const match = archiveName.match(archiveNamePattern(prefix));
  if (!match) return null;

  const [, namePrefix = "", date = "", time = ""] = match;
  const createdAt = new Date(
    Number(date.slice(0, 4)),
    Number(date.slice(4, 6)) - 1,
    Number(date.slice(6, 8)),
    Number(time.slice(0, 2)),
    Number(time.slice(2, 4)),
    Number(time.slice(4, 6)),
  );

  return { prefix: namePrefix, date, time, createdAt };
}

export function isValidArchiveName(
  archiveName: string,
  prefix: string = DEFAULT_ARCHIVE_PREFIX,
): boolean {
  return archiveNamePattern(prefix).test(archiveName);
}
