/**
 * Table and summary formatters
 */

import color from "picocolors";
import type { BackupFileRecord } from "../../types";
import { formatBytes, formatTimestamp } from "../../utils/format";

export const TABLE_WIDTHS = {
  index: 3,
  archiveName: 30,
  size: 12,
  created: 19,
} as const;

export const DEFAULT_STATUS_LIMIT = 5;

export interface SummaryItem {
  label: string;
  value: string | number | null | undefined;
}

export function formatSummary(items: SummaryItem[]): string {
  const shown = items.filter((i) => i.value !== null && i.value !== undefined);
  const maxLabelLen = Math.max(0, ...shown.map((i) => i.label.length));
  return shown.map((i) => `${color.dim(i.label.padEnd(maxLabelLen))}  ${i.value}`).join("\n");
}

export function formatTableRow(columns: string[], widths: number[]): string {
  return columns.map((col, i) => col.padEnd(widths[i] ?? 0)).join(color.dim(" │ "));
}

export function formatTableSeparator(widths: number[]): string {
  return color.dim(widths.map((w) => "─".repeat(w)).join("─┼─"));
}

/**
 * Plain-text backup listing, newest first, for replies to a status request.
 * Shows at most `limit` entries and says how many were left out.
 */
export function formatBackupListing(
  backupDir: string,
  records: BackupFileRecord[],
  limit: number = DEFAULT_STATUS_LIMIT,
): string {
  if (records.length === 0) {
    return `No backups found in ${backupDir}`;
  }

  const lines = [`Backup directory: ${backupDir}`, `${records.length} backup(s)`, ""];

  records.slice(0, limit).forEach((record, i) => {
    lines.push(`${i + 1}. ${record.fileName}`);
    lines.push(`   Size: ${formatBytes(record.sizeBytes)}`);
    lines.push(`   Time: ${formatTimestamp(record.modifiedAt)}`);
  });

  if (records.length > limit) {
    lines.push("", `...and ${records.length - limit} more`);
  }

  return lines.join("\n");
}
