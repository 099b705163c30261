import { parseArgs } from "node:util";
import { extractInlineOptions, findAndLoadConfig, INLINE_CONFIG_OPTIONS } from "../../config/loader";
import { BackupOrchestrator, getCleanupCandidates, readBackupFiles } from "../../core";
import { errorMessage } from "../../core/errors";
import { setLogLevel } from "../../utils/logger";
import { currentUser, isAdministrator } from "../permissions";
import { color, formatSummary, ui } from "../ui";

export async function cleanupCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      config: { type: "string", short: "c" },
      "dry-run": { type: "boolean", default: false },
      force: { type: "boolean", default: false },
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

  try {
    const config = await findAndLoadConfig(values.config, extractInlineOptions(values));
    const user = currentUser();

    ui.intro("autobackup cleanup");

    if (!isAdministrator(config, user)) {
      ui.error(`Only administrators can delete backups (user: ${user || "unknown"})`);
      return 1;
    }

    // Preview what will be deleted first
    const backups = await readBackupFiles(config.backupPath, config.archive.prefix);
    const candidates = getCleanupCandidates(backups, config.retention.maxBackups);

    if (candidates.length === 0) {
      ui.success(`${backups.length} backup(s), limit ${config.retention.maxBackups}: nothing to clean up`);
      ui.outro("Nothing to do");
      return 0;
    }

    ui.step(`Found ${candidates.length} backup(s) over the limit of ${config.retention.maxBackups}:`);
    for (const candidate of candidates) {
      ui.message(`  ${color.dim("•")} ${candidate.fileName}`);
    }

    // Confirm deletion unless --force or --dry-run
    if (!values.force && !values["dry-run"]) {
      const confirmed = await ui.confirm({
        message: `Delete ${candidates.length} backup(s)?`,
        initialValue: false,
      });

      if (ui.isCancel(confirmed) || !confirmed) {
        ui.cancel("Cleanup cancelled");
        return 1;
      }
    }

    if (values["dry-run"]) {
      ui.warn("[DRY RUN] No changes were made.");
      ui.outro("Preview complete");
      return 0;
    }

    const s = ui.spinner();
    s.start("Cleaning up old backups...");

    const result = await new BackupOrchestrator(config).cleanup();

    if (!result.success) {
      s.stop("Cleanup failed", 1);
      ui.error(`[${result.error.kind}] ${result.error.message}`);
      return 1;
    }

    s.stop("Cleanup complete");

    const { deleted, failures } = result.retention;
    for (const name of deleted) {
      ui.message(`  [${color.green("OK")}] ${name}`);
    }
    for (const failure of failures) {
      ui.message(`  [${color.red("FAILED")}] ${failure.fileName}`);
      ui.error(`         ${failure.error}`);
    }

    ui.note(
      formatSummary([
        { label: "Deleted", value: deleted.length },
        { label: "Failed", value: failures.length },
      ]),
      "Cleanup Summary",
    );

    ui.outro(failures.length > 0 ? "Cleanup finished with errors" : "Cleanup complete!");
    return failures.length > 0 ? 1 : 0;
  } catch (error) {
    ui.error(`Cleanup failed: ${errorMessage(error)}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printHelp(): void {
  console.log(`
${color.bold("autobackup cleanup")} - Delete backups beyond max_backups

${color.dim("USAGE:")}
  autobackup cleanup [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./autobackup.config.yaml)
      --dry-run           Show what would be deleted without deleting
      --force             Skip the confirmation prompt
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("EXAMPLES:")}
  autobackup cleanup --dry-run             # Preview cleanup
  autobackup cleanup --force               # Delete without asking
  autobackup cleanup --max-backups 3       # Keep only the newest 3
`);
}
