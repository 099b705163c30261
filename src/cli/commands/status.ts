import { parseArgs } from "node:util";
import { extractInlineOptions, findAndLoadConfig, INLINE_CONFIG_OPTIONS } from "../../config/loader";
import { BackupOrchestrator } from "../../core";
import { errorMessage } from "../../core/errors";
import { formatBytes, formatTimestamp } from "../../utils/format";
import { setLogLevel } from "../../utils/logger";
import {
  color,
  DEFAULT_STATUS_LIMIT,
  formatBackupListing,
  formatTableRow,
  formatTableSeparator,
  TABLE_WIDTHS,
  ui,
} from "../ui";

export async function statusCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      config: { type: "string", short: "c" },
      limit: { type: "string", short: "n" },
      format: { type: "string", default: "table" },
      verbose: { type: "boolean", short: "v", default: false },
      help: { type: "boolean", short: "h", default: false },
      ...INLINE_CONFIG_OPTIONS,
    },
    allowPositionals: false,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  if (values.verbose) {
    setLogLevel("debug");
  }

  const limit = values.limit ? Number.parseInt(values.limit, 10) : DEFAULT_STATUS_LIMIT;
  if (!Number.isInteger(limit) || limit < 1) {
    ui.error(`--limit must be a positive integer, got "${values.limit}"`);
    return 1;
  }

  try {
    const config = await findAndLoadConfig(values.config, extractInlineOptions(values));
    const orchestrator = new BackupOrchestrator(config);
    const backups = await orchestrator.status();

    // No intro for scripting formats
    if (values.format === "json") {
      console.log(
        JSON.stringify(
          backups.slice(0, limit).map((b) => ({
            fileName: b.fileName,
            path: b.path,
            sizeBytes: b.sizeBytes,
            modifiedAt: b.modifiedAt.toISOString(),
          })),
          null,
          2,
        ),
      );
      return 0;
    }

    if (values.format === "text") {
      console.log(formatBackupListing(config.backupPath, backups, limit));
      return 0;
    }

    ui.intro("autobackup status");
    ui.info(`Backup directory: ${config.backupPath}`);

    if (backups.length === 0) {
      ui.info("No backups found");
      ui.outro("Done");
      return 0;
    }

    const widths = [TABLE_WIDTHS.index, TABLE_WIDTHS.archiveName, TABLE_WIDTHS.size, TABLE_WIDTHS.created];

    ui.step("Backups:");
    console.log(formatTableRow(["#", "Archive", "Size", "Created"], widths));
    console.log(formatTableSeparator(widths));

    backups.slice(0, limit).forEach((backup, i) => {
      console.log(
        formatTableRow(
          [
            String(i + 1),
            backup.fileName,
            formatBytes(backup.sizeBytes),
            formatTimestamp(backup.modifiedAt),
          ],
          widths,
        ),
      );
    });

    if (backups.length > limit) {
      ui.message(color.dim(`...and ${backups.length - limit} more`));
    }

    ui.outro(`${backups.length} backup(s) total`);
    return 0;
  } catch (error) {
    ui.error(`Status failed: ${errorMessage(error)}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printHelp(): void {
  console.log(`
${color.bold("autobackup status")} - List existing backups

${color.dim("USAGE:")}
  autobackup status [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./autobackup.config.yaml)
  -n, --limit <number>    Number of backups to show (default: ${DEFAULT_STATUS_LIMIT})
      --format <format>   Output format: table, text, json (default: table)
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("EXAMPLES:")}
  autobackup status                        # Newest 5 backups
  autobackup status -n 20                  # Newest 20 backups
  autobackup status --format text          # Plain listing (for chat replies)
  autobackup status --format json          # Output as JSON (for scripting)
`);
}
