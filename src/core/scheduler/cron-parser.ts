/**
 * Cron expression parser and evaluator
 *
 * Supports: minute hour day-of-month month day-of-week
 *
 * Each field takes `*`, a number, a range `a-b`, a step (`*\/N`, `a-b/N`,
 * `a/N`) or a comma-separated list of those. Steps are anchored at the
 * field's minimum, so `*\/7` in day-of-month fires on the 1st, 8th, 15th,
 * 22nd and 29th. Day-of-week accepts 0-7 with both 0 and 7 meaning Sunday.
 *
 * When day-of-month and day-of-week are both restricted (neither starts
 * with `*`) a day matches if either does, as in standard cron.
 *
 * Examples:
 *   "0 * * * *"      - Every hour at minute 0
 *   "0 2 * * *"      - Every day at 2:00 AM
 *   "0 3 * * 0"      - Every Sunday at 3:00 AM
 *   "0 0 *\/7 * *"    - Midnight on days 1, 8, 15, 22 and 29
 *   "0,15,30,45 * * * *" - Every 15 minutes
 */

import { BackupError } from "../errors";

interface FieldSpec {
  name: string;
  min: number;
  max: number;
}

const FIELD_SPECS = [
  { name: "minute", min: 0, max: 59 },
  { name: "hour", min: 0, max: 23 },
  { name: "day-of-month", min: 1, max: 31 },
  { name: "month", min: 1, max: 12 },
  { name: "day-of-week", min: 0, max: 7 },
] as const satisfies readonly FieldSpec[];

const MINUTE_MS = 60 * 1000;
const SEARCH_HORIZON_YEARS = 5;

export interface CronField {
  values: ReadonlySet<number>;
  /** Field text starts with `*` */
  wildcard: boolean;
}

export interface ParsedCron {
  expression: string;
  minute: CronField;
  hour: CronField;
  dayOfMonth: CronField;
  month: CronField;
  dayOfWeek: CronField;
}

function invalid(expression: string, reason: string): BackupError {
  return new BackupError("invalid_expression", `Invalid cron expression: "${expression}". ${reason}`);
}

function parseNumber(token: string, spec: FieldSpec, expression: string): number {
  if (!/^\d+$/.test(token)) {
    throw invalid(expression, `${spec.name} value "${token}" is not a number.`);
  }
  const value = Number(token);
  if (value < spec.min || value > spec.max) {
    throw invalid(expression, `${spec.name} value ${value} is out of range ${spec.min}-${spec.max}.`);
  }
  return value;
}

function parseField(source: string, spec: FieldSpec, expression: string): CronField {
  const values = new Set<number>();

  for (const part of source.split(",")) {
    const [range = "", stepToken, ...extra] = part.split("/");
    if (!range || extra.length > 0) {
      throw invalid(expression, `Malformed ${spec.name} field "${source}".`);
    }

    let step = 1;
    if (stepToken !== undefined) {
      if (!/^\d+$/.test(stepToken) || Number(stepToken) < 1) {
        throw invalid(expression, `${spec.name} step "${stepToken}" must be a positive integer.`);
      }
      step = Number(stepToken);
    }

    let start: number;
    let end: number;
    if (range === "*") {
      start = spec.min;
      end = spec.max;
    } else if (range.includes("-")) {
      const [from = "", to = "", ...rest] = range.split("-");
      if (rest.length > 0) {
        throw invalid(expression, `Malformed ${spec.name} range "${range}".`);
      }
      start = parseNumber(from, spec, expression);
      end = parseNumber(to, spec, expression);
      if (start > end) {
        throw invalid(expression, `${spec.name} range "${range}" is reversed.`);
      }
    } else {
      start = parseNumber(range, spec, expression);
      end = stepToken === undefined ? start : spec.max;
    }

    for (let value = start; value <= end; value += step) {
      values.add(value);
    }
  }

  return { values, wildcard: source.startsWith("*") };
}

/**
 * Parse a five-field cron expression. Throws a BackupError of kind
 * `invalid_expression` on any syntax or range problem.
 */
export function parseCron(expression: string): ParsedCron {
  const fields = expression.trim().split(/\s+/).filter(Boolean);
  if (fields.length !== 5) {
    throw invalid(expression, `Expected 5 fields, got ${fields.length}.`);
  }

  const [minute, hour, dayOfMonth, month, dayOfWeek] = FIELD_SPECS.map((spec, i) =>
    parseField(fields[i] ?? "", spec, expression),
  );
  if (!minute || !hour || !dayOfMonth || !month || !dayOfWeek) {
    throw invalid(expression, "Missing field.");
  }

  // 7 is an alias for Sunday
  if (dayOfWeek.values.has(7)) {
    const values = new Set(dayOfWeek.values);
    values.delete(7);
    values.add(0);
    return { expression, minute, hour, dayOfMonth, month, dayOfWeek: { ...dayOfWeek, values } };
  }

  return { expression, minute, hour, dayOfMonth, month, dayOfWeek };
}

export function truncateToMinute(date: Date): Date {
  const truncated = new Date(date);
  truncated.setSeconds(0, 0);
  return truncated;
}

function matchesDay(cron: ParsedCron, date: Date): boolean {
  const domMatch = cron.dayOfMonth.values.has(date.getDate());
  const dowMatch = cron.dayOfWeek.values.has(date.getDay());

  if (cron.dayOfMonth.wildcard || cron.dayOfWeek.wildcard) {
    return domMatch && dowMatch;
  }
  return domMatch || dowMatch;
}

/**
 * Does the minute containing `date` (local time) match the expression?
 */
export function matchesCron(cron: ParsedCron, date: Date): boolean {
  return (
    cron.minute.values.has(date.getMinutes()) &&
    cron.hour.values.has(date.getHours()) &&
    cron.month.values.has(date.getMonth() + 1) &&
    matchesDay(cron, date)
  );
}

/**
 * First matching minute strictly after `from`, or null when the expression
 * never matches within the search horizon (e.g. February 30th).
 */
export function nextTrigger(cron: ParsedCron, from: Date = new Date()): Date | null {
  const candidate = new Date(truncateToMinute(from).getTime() + MINUTE_MS);
  const horizon = new Date(candidate);
  horizon.setFullYear(horizon.getFullYear() + SEARCH_HORIZON_YEARS);

  while (candidate.getTime() <= horizon.getTime()) {
    if (!cron.month.values.has(candidate.getMonth() + 1)) {
      candidate.setMonth(candidate.getMonth() + 1, 1);
      candidate.setHours(0, 0, 0, 0);
      continue;
    }
    if (!matchesDay(cron, candidate)) {
      candidate.setDate(candidate.getDate() + 1);
      candidate.setHours(0, 0, 0, 0);
      continue;
    }
    if (!cron.hour.values.has(candidate.getHours())) {
      candidate.setHours(candidate.getHours() + 1, 0, 0, 0);
      continue;
    }
    if (!cron.minute.values.has(candidate.getMinutes())) {
      candidate.setMinutes(candidate.getMinutes() + 1, 0, 0);
      continue;
    }
    return candidate;
  }

  return null;
}

/**
 * True once per matching minute: `now` matches and the last run (if any)
 * happened in an earlier minute.
 */
export function isDue(cron: ParsedCron, lastRun: Date | null, now: Date): boolean {
  const minute = truncateToMinute(now);
  if (!matchesCron(cron, minute)) return false;

  return lastRun === null || truncateToMinute(lastRun).getTime() < minute.getTime();
}
