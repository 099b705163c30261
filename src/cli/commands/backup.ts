import { parseArgs } from "node:util";
import { extractInlineOptions, findAndLoadConfig, INLINE_CONFIG_OPTIONS } from "../../config/loader";
import { BackupOrchestrator } from "../../core";
import { errorMessage } from "../../core/errors";
import { setLogLevel } from "../../utils/logger";
import { formatBytes, formatDuration } from "../../utils/format";
import { currentUser, isAdministrator } from "../permissions";
import { color, formatSummary, ui } from "../ui";

export async function backupCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      config: { type: "string", short: "c" },
      verbose: { type: "boolean", short: "v", default: false },
      help: { type: "boolean", short: "h", default: false },
      // Inline config options
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

  try {
    const config = await findAndLoadConfig(values.config, extractInlineOptions(values));
    const orchestrator = new BackupOrchestrator(config);
    const user = currentUser();

    ui.intro("autobackup backup");

    const isAdmin = isAdministrator(config, user);
    if (!isAdmin) {
      const denied = await orchestrator.trigger({ isAdmin, origin: "manual" });
      if (!denied.success) {
        ui.error(`${denied.error.message} (user: ${user || "unknown"})`);
      }
      return 1;
    }

    const s = ui.spinner();
    s.start(`Archiving ${config.sourcePath}...`);

    const result = await orchestrator.trigger({ isAdmin, origin: "manual" });

    if (!result.success) {
      s.stop("Backup failed", 1);
      ui.error(`[${result.error.kind}] ${result.error.message}`);
      return 1;
    }

    s.stop("Archive created");

    ui.note(
      formatSummary([
        { label: "Archive", value: result.archiveName },
        { label: "Location", value: result.archivePath },
        { label: "Size", value: formatBytes(result.sizeBytes) },
        { label: "Files", value: result.filesCount },
        { label: "Skipped", value: result.skippedCount > 0 ? result.skippedCount : null },
        { label: "Duration", value: formatDuration(result.durationMs) },
        {
          label: "Old backups deleted",
          value: result.retention.deleted.length > 0 ? result.retention.deleted.join(", ") : null,
        },
      ]),
      "Backup Summary",
    );

    for (const warning of result.warnings) {
      ui.warn(warning);
    }

    ui.outro("Backup complete!");
    return 0;
  } catch (error) {
    ui.error(`Backup failed: ${errorMessage(error)}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printHelp(): void {
  console.log(`
${color.bold("autobackup backup")} - Create a backup now

${color.dim("USAGE:")}
  autobackup backup [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./autobackup.config.yaml)
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("INLINE CONFIG OPTIONS:")}
      --source <path>              Directory to back up
      --backup-path <path>         Directory archives are written to
      --max-backups <n>            Number of archives to keep (default: 5)
      --exclude-dir <name>         Extra directory name to exclude (can be repeated)
      --exclude-ext <suffix>       Extra file suffix to exclude (can be repeated)
      --compression <0-9>          Compression level (default: 6)

${color.dim("PERMISSIONS:")}
  When ${color.cyan("admins")} is set in the config file, only the listed users may run
  a manual backup.

${color.dim("EXAMPLES:")}
  autobackup backup                                  # Back up using ./autobackup.config.yaml
  autobackup backup --source ./app --backup-path /var/backups
  autobackup backup --max-backups 10 --exclude-dir dist
`);
}
