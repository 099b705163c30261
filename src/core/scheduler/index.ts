/**
 * Scheduler module exports
 */

export {
  type CronField,
  isDue,
  matchesCron,
  nextTrigger,
  type ParsedCron,
  parseCron,
  truncateToMinute,
} from "./cron-parser";
export {
  DEFAULT_CHECK_INTERVAL_MS,
  Scheduler,
  type SchedulerOptions,
  type SchedulerStatus,
} from "./daemon";
