/**
 * Scheduler daemon
 */

import type { AutoBackupConfig, BackupRunResult } from "../../types";
import { logger } from "../../utils/logger";
import type { BackupOrchestrator } from "../backup";
import { errorMessage } from "../errors";
import { isDue, nextTrigger, type ParsedCron, parseCron, truncateToMinute } from "./cron-parser";

export const DEFAULT_CHECK_INTERVAL_MS = 30 * 1000;

interface ScheduleState {
  cron: ParsedCron;
  lastRun: Date | null;
  nextRun: Date | null;
  lastResult: BackupRunResult | null;
}

export interface SchedulerOptions {
  /** How often the schedule is checked; must be under a minute to see every minute */
  checkIntervalMs?: number;
  /** Receives the result of every scheduled run */
  onResult?: (result: BackupRunResult) => void;
}

export interface SchedulerStatus {
  cron: string;
  running: boolean;
  lastRun: Date | null;
  nextRun: Date | null;
  lastResult: BackupRunResult | null;
}

export class Scheduler {
  private readonly state: ScheduleState;
  private readonly pending = new Set<Promise<void>>();
  private checkInterval: NodeJS.Timeout | null = null;
  private running = false;

  /**
   * Throws a BackupError of kind `invalid_expression` for a bad cron
   * expression, before anything is scheduled.
   */
  constructor(
    config: AutoBackupConfig,
    private readonly orchestrator: BackupOrchestrator,
    private readonly options: SchedulerOptions = {},
  ) {
    const cron = parseCron(config.cronExpression);
    this.state = { cron, lastRun: null, nextRun: nextTrigger(cron, new Date()), lastResult: null };
    logger.debug(`Parsed schedule: ${cron.expression}`);
  }

  start(): void {
    if (this.running) {
      logger.warn("Scheduler is already running");
      return;
    }

    this.running = true;
    logger.info(`Scheduler started (${this.state.cron.expression})`);

    this.tick(new Date());

    this.checkInterval = setInterval(() => {
      this.tick(new Date());
    }, this.options.checkIntervalMs ?? DEFAULT_CHECK_INTERVAL_MS);
  }

  /**
   * Stop checking the schedule and wait for a scheduled run still in progress.
   */
  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }

    this.running = false;

    if (this.checkInterval) {
      clearInterval(this.checkInterval);
      this.checkInterval = null;
    }

    if (this.pending.size > 0) {
      logger.info("Waiting for the running backup to finish...");
      await Promise.all(this.pending);
    }

    logger.info("Scheduler stopped");
  }

  /**
   * Evaluate the schedule at `now`. Launches a backup in the background when
   * due and returns whether it did.
   */
  tick(now: Date = new Date()): boolean {
    const { cron } = this.state;
    const due = isDue(cron, this.state.lastRun, now);

    if (this.state.nextRun && now.getTime() >= this.state.nextRun.getTime()) {
      this.state.nextRun = nextTrigger(cron, now);
    }

    if (!due) {
      return false;
    }

    this.state.lastRun = truncateToMinute(now);
    logger.info(`Schedule "${cron.expression}" triggered`);

    const run = this.execute();
    this.pending.add(run);
    void run.finally(() => this.pending.delete(run));
    return true;
  }

  private async execute(): Promise<void> {
    try {
      const result = await this.orchestrator.trigger({ isAdmin: true, origin: "scheduled" });
      this.state.lastResult = result;

      if (result.success) {
        logger.info(
          `Scheduled backup completed: ${result.archiveName} (${result.filesCount} files, ${result.retention.deleted.length} old backup(s) deleted)`,
        );
      } else {
        logger.error(`Scheduled backup failed [${result.error.kind}]: ${result.error.message}`);
      }

      this.options.onResult?.(result);
    } catch (error) {
      logger.error(`Scheduled backup crashed: ${errorMessage(error)}`, error);
    }
  }

  getNextRun(): Date | null {
    return this.state.nextRun;
  }

  getStatus(): SchedulerStatus {
    return {
      cron: this.state.cron.expression,
      running: this.running,
      lastRun: this.state.lastRun,
      nextRun: this.state.nextRun,
      lastResult: this.state.lastResult,
    };
  }
}
