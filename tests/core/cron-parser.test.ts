import { describe, expect, test } from "vitest";
import { BackupError } from "../../src/core/errors";
import { isDue, matchesCron, nextTrigger, parseCron } from "../../src/core/scheduler/cron-parser";

function parseError(expression: string): BackupError {
  try {
    parseCron(expression);
  } catch (error) {
    if (error instanceof BackupError) return error;
    throw error;
  }
  throw new Error(`"${expression}" was accepted`);
}

const sorted = (values: ReadonlySet<number>) => [...values].sort((a, b) => a - b);

describe("cron parser", () => {
  describe("parseCron", () => {
    test("expands steps anchored at the field minimum", () => {
      const cron = parseCron("0 0 */7 * *");

      expect(sorted(cron.dayOfMonth.values)).toEqual([1, 8, 15, 22, 29]);
      expect(sorted(cron.minute.values)).toEqual([0]);
      expect(cron.month.values.size).toBe(12);
      expect(cron.dayOfMonth.wildcard).toBe(true);
    });

    test("supports ranges, stepped ranges, start steps and lists", () => {
      const cron = parseCron("5/20 1-10/3 1,15,31 6-8 1-5");

      expect(sorted(cron.minute.values)).toEqual([5, 25, 45]);
      expect(sorted(cron.hour.values)).toEqual([1, 4, 7, 10]);
      expect(sorted(cron.dayOfMonth.values)).toEqual([1, 15, 31]);
      expect(sorted(cron.month.values)).toEqual([6, 7, 8]);
      expect(sorted(cron.dayOfWeek.values)).toEqual([1, 2, 3, 4, 5]);
      expect(cron.dayOfMonth.wildcard).toBe(false);
    });

    test("treats day-of-week 7 as Sunday", () => {
      expect(sorted(parseCron("0 0 * * 7").dayOfWeek.values)).toEqual([0]);
      expect(sorted(parseCron("0 0 * * 5-7").dayOfWeek.values)).toEqual([0, 5, 6]);
    });

    test("tolerates surrounding and repeated whitespace", () => {
      expect(parseCron("  0   2 * * *  ").expression).toBe("  0   2 * * *  ");
      expect(sorted(parseCron("  0   2 * * *  ").hour.values)).toEqual([2]);
    });

    test("rejects the wrong number of fields", () => {
      const error = parseError("0 0 * *");
      expect(error.kind).toBe("invalid_expression");
      expect(error.message).toBe('Invalid cron expression: "0 0 * *". Expected 5 fields, got 4.');

      expect(parseError("").message).toContain("Expected 5 fields, got 0.");
      expect(parseError("0 0 * * * *").kind).toBe("invalid_expression");
    });

    test("rejects non-numeric tokens", () => {
      expect(parseError("a * * * *").message).toContain('minute value "a" is not a number.');
      expect(parseError("0 0 * JAN *").kind).toBe("invalid_expression");
      expect(parseError("-1 * * * *").kind).toBe("invalid_expression");
    });

    test("rejects out-of-range values", () => {
      expect(parseError("60 * * * *").message).toContain("minute value 60 is out of range 0-59.");
      expect(parseError("* 24 * * *").kind).toBe("invalid_expression");
      expect(parseError("* * 0 * *").kind).toBe("invalid_expression");
      expect(parseError("* * * 13 *").kind).toBe("invalid_expression");
      expect(parseError("* * * * 8").kind).toBe("invalid_expression");
    });

    test("rejects zero and malformed steps", () => {
      expect(parseError("*/0 * * * *").message).toContain('minute step "0" must be a positive integer.');
      expect(parseError("*/x * * * *").kind).toBe("invalid_expression");
      expect(parseError("*/5/2 * * * *").kind).toBe("invalid_expression");
    });

    test("rejects reversed ranges and empty list items", () => {
      expect(parseError("* 5-1 * * *").message).toContain('hour range "5-1" is reversed.');
      expect(parseError("1,,2 * * * *").kind).toBe("invalid_expression");
    });
  });

  describe("matchesCron", () => {
    test("matches the minute regardless of seconds", () => {
      const cron = parseCron("30 14 * * *");

      expect(matchesCron(cron, new Date(2025, 0, 11, 14, 30, 45))).toBe(true);
      expect(matchesCron(cron, new Date(2025, 0, 11, 14, 31, 0))).toBe(false);
    });

    test("ORs day-of-month and day-of-week when both are restricted", () => {
      // 1st of the month or any Monday
      const cron = parseCron("0 0 1 * 1");

      expect(matchesCron(cron, new Date(2025, 0, 1))).toBe(true); // Wednesday the 1st
      expect(matchesCron(cron, new Date(2025, 0, 6))).toBe(true); // Monday
      expect(matchesCron(cron, new Date(2025, 0, 2))).toBe(false);
    });

    test("ANDs the day fields when one starts with *", () => {
      const mondays = parseCron("0 0 * * 1");
      expect(matchesCron(mondays, new Date(2025, 0, 6))).toBe(true);
      expect(matchesCron(mondays, new Date(2025, 0, 7))).toBe(false);

      const stepped = parseCron("0 0 */7 * 1");
      expect(matchesCron(stepped, new Date(2025, 0, 6))).toBe(false); // Monday, not a step day
      expect(matchesCron(stepped, new Date(2025, 0, 8))).toBe(false); // step day, Wednesday
      expect(matchesCron(stepped, new Date(2025, 8, 15))).toBe(true); // both
    });
  });

  describe("nextTrigger", () => {
    test("returns the first matching minute strictly after `from`", () => {
      const cron = parseCron("30 14 * * *");

      expect(nextTrigger(cron, new Date(2025, 0, 11, 14, 29, 59))).toEqual(new Date(2025, 0, 11, 14, 30));
      expect(nextTrigger(cron, new Date(2025, 0, 11, 14, 30, 0))).toEqual(new Date(2025, 0, 12, 14, 30));
    });

    test("steps through days of the month", () => {
      const cron = parseCron("0 0 */7 * *");

      expect(nextTrigger(cron, new Date(2025, 0, 1, 0, 0))).toEqual(new Date(2025, 0, 8, 0, 0));
      expect(nextTrigger(cron, new Date(2025, 0, 29, 12, 0))).toEqual(new Date(2025, 1, 1, 0, 0));
    });

    test("finds minute steps within the hour", () => {
      const cron = parseCron("*/15 * * * *");

      expect(nextTrigger(cron, new Date(2025, 0, 11, 10, 7))).toEqual(new Date(2025, 0, 11, 10, 15));
      expect(nextTrigger(cron, new Date(2025, 0, 11, 10, 50))).toEqual(new Date(2025, 0, 11, 11, 0));
    });

    test("finds the next weekday", () => {
      // 2025-01-11 is a Saturday
      expect(nextTrigger(parseCron("0 3 * * 0"), new Date(2025, 0, 11, 9, 0))).toEqual(
        new Date(2025, 0, 12, 3, 0),
      );
      expect(nextTrigger(parseCron("0 3 * * 7"), new Date(2025, 0, 11, 9, 0))).toEqual(
        new Date(2025, 0, 12, 3, 0),
      );
    });

    test("rolls over into the next year", () => {
      const cron = parseCron("0 0 1 1 *");

      expect(nextTrigger(cron, new Date(2025, 5, 15))).toEqual(new Date(2026, 0, 1, 0, 0));
    });

    test("returns null when the expression can never fire", () => {
      expect(nextTrigger(parseCron("0 0 30 2 *"), new Date(2025, 0, 1))).toBeNull();
    });
  });

  describe("weekly default schedule", () => {
    const cron = parseCron("0 0 */7 * *");
    const dueDays = [1, 8, 15, 22, 29];

    test.each([
      [2025, 0, 31],
      [2025, 1, 28],
      [2024, 1, 29],
    ])("fires only at midnight on days 1, 8, 15, 22, 29 (%i-%i)", (year, month, days) => {
      for (let day = 1; day <= days; day++) {
        expect(isDue(cron, null, new Date(year, month, day, 0, 0, 30))).toBe(dueDays.includes(day));
        for (const [hour, minute] of [
          [0, 1],
          [1, 0],
          [12, 0],
          [23, 59],
        ] as const) {
          expect(isDue(cron, null, new Date(year, month, day, hour, minute))).toBe(false);
        }
      }
    });
  });

  describe("isDue", () => {
    const cron = parseCron("30 14 * * *");
    const now = new Date(2025, 0, 11, 14, 30, 10);

    test("is due in a matching minute that has not run yet", () => {
      expect(isDue(cron, null, now)).toBe(true);
      expect(isDue(cron, new Date(2025, 0, 10, 14, 30, 5), now)).toBe(true);
    });

    test("fires at most once per matching minute", () => {
      expect(isDue(cron, new Date(2025, 0, 11, 14, 30, 0), now)).toBe(false);
      expect(isDue(cron, new Date(2025, 0, 11, 14, 30, 59), new Date(2025, 0, 11, 14, 30, 40))).toBe(false);
    });

    test("is not due outside a matching minute", () => {
      expect(isDue(cron, null, new Date(2025, 0, 11, 14, 31, 0))).toBe(false);
    });
  });
});
