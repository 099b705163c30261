#!/usr/bin/env node

import * as p from "@clack/prompts";
import color from "picocolors";
import { backupCommand } from "./cli/commands/backup";
import { cleanupCommand } from "./cli/commands/cleanup";
import { startCommand } from "./cli/commands/start";
import { statusCommand } from "./cli/commands/status";
import { banner, LOGO, VERSION } from "./cli/ui";

function printHelp(): void {
  banner("help");

  p.note(
    `${color.cyan("start")}       Start the scheduler daemon
${color.cyan("backup")}      Create a backup now
${color.cyan("status")}      List existing backups
${color.cyan("cleanup")}     Delete backups beyond max_backups`,
    "Commands",
  );

  p.note(
    `-h, --help      Show this help message
-v, --version   Show version`,
    "Options",
  );

  p.note(
    `autobackup start                  ${color.dim("# Start scheduler daemon")}
autobackup backup                 ${color.dim("# Back up now")}
autobackup status -n 10           ${color.dim("# Newest 10 backups")}
autobackup cleanup --dry-run      ${color.dim("# Preview cleanup")}`,
    "Examples",
  );

  p.outro(`Run ${color.cyan("autobackup <command> --help")} for command details`);
}

function printVersion(): void {
  console.log(color.bold(color.cyan(LOGO)));
  p.outro(`${color.cyan("autobackup")} ${color.dim(`v${VERSION}`)}`);
}

async function main(): Promise<number> {
  const args = process.argv.slice(2);

  if (args.length === 0) {
    printHelp();
    return 0;
  }

  const command = args[0];
  const commandArgs = args.slice(1);

  switch (command) {
    case "start":
      return startCommand(commandArgs);

    case "backup":
      return backupCommand(commandArgs);

    case "status":
      return statusCommand(commandArgs);

    case "cleanup":
      return cleanupCommand(commandArgs);

    case "-h":
    case "--help":
    case "help":
      printHelp();
      return 0;

    case "-v":
    case "--version":
    case "version":
      printVersion();
      return 0;

    default:
      console.error(`${color.red("Error:")} Unknown command: ${command}`);
      console.error(`Run ${color.cyan("autobackup --help")} for usage information.`);
      return 1;
  }
}

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    console.error(`${color.red("Fatal error:")}`, error);
    process.exit(1);
  });
