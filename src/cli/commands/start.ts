import { parseArgs } from "node:util";
import { extractInlineOptions, findAndLoadConfig, INLINE_CONFIG_OPTIONS } from "../../config/loader";
import { BackupOrchestrator, Scheduler } from "../../core";
import { errorMessage } from "../../core/errors";
import { formatTimestamp } from "../../utils/format";
import { setLogLevel } from "../../utils/logger";
import { color, ui } from "../ui";

export async function startCommand(args: string[]): Promise<number> {
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

    ui.intro("autobackup scheduler");

    const orchestrator = new BackupOrchestrator(config);
    const scheduler = new Scheduler(config, orchestrator);

    const nextRun = scheduler.getNextRun();
    ui.step("Schedule:");
    ui.message(
      `  ${color.cyan(config.cronExpression.padEnd(15))} ${color.dim("next:")} ${nextRun ? formatTimestamp(nextRun) : "never"}`,
    );
    ui.message(`  ${color.dim("source:")}  ${config.sourcePath}`);
    ui.message(`  ${color.dim("backups:")} ${config.backupPath} ${color.dim(`(keep ${config.retention.maxBackups})`)}`);

    scheduler.start();

    ui.success("Scheduler is running");
    ui.info("Press Ctrl+C to stop");

    await new Promise<void>((resolve) => {
      const shutdown = () => {
        ui.cancel("Shutting down...");
        resolve();
      };
      process.once("SIGINT", shutdown);
      process.once("SIGTERM", shutdown);
    });

    await scheduler.stop();
    return 0;
  } catch (error) {
    ui.error(`Failed to start: ${errorMessage(error)}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printHelp(): void {
  console.log(`
${color.bold("autobackup start")} - Start the scheduler daemon

${color.dim("USAGE:")}
  autobackup start [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./autobackup.config.yaml)
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("INLINE CONFIG OPTIONS:")}
      --source <path>              Directory to back up
      --backup-path <path>         Directory archives are written to
      --cron <expression>          Backup schedule (default: "0 0 */7 * *")
      --max-backups <n>            Number of archives to keep (default: 5)
      --exclude-dir <name>         Extra directory name to exclude (can be repeated)
      --exclude-ext <suffix>       Extra file suffix to exclude (can be repeated)
      --compression <0-9>          Compression level (default: 6)

${color.dim("DESCRIPTION:")}
  Runs autobackup as a long-running daemon that creates a backup whenever the
  cron expression matches. After each backup the oldest archives beyond
  max_backups are deleted.

${color.dim("SCHEDULE FORMAT:")}
  Schedules use standard cron format: minute hour day-of-month month day-of-week

  Examples:
    "0 0 */7 * *"   - Midnight on days 1, 8, 15, 22 and 29 (default)
    "0 2 * * *"     - Every day at 2:00 AM
    "0 3 * * 0"     - Every Sunday at 3:00 AM
    "*/15 * * * *"  - Every 15 minutes

${color.dim("EXAMPLES:")}
  autobackup start                            # Start with ./autobackup.config.yaml
  autobackup start -c /etc/autobackup.yaml    # Start with specific config
  autobackup start --source /srv/app --cron "0 4 * * *"
`);
}
