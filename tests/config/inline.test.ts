import { parseArgs } from "node:util";
import { describe, expect, test } from "vitest";
import {
  buildInlineConfig,
  DEFAULT_CONFIG,
  extractInlineOptions,
  hasInlineOptions,
  INLINE_CONFIG_OPTIONS,
  mergeInlineConfig,
} from "../../src/config";

describe("inline config", () => {
  describe("extractInlineOptions", () => {
    test("reads parseArgs values", () => {
      const { values } = parseArgs({
        args: [
          "--source",
          "./world",
          "--max-backups",
          "3",
          "--exclude-dir",
          "cache",
          "--exclude-dir",
          "dist",
          "--exclude-ext",
          ".bak",
          "--compression",
          "9",
        ],
        options: INLINE_CONFIG_OPTIONS,
      });

      expect(extractInlineOptions(values)).toEqual({
        source: "./world",
        maxBackups: 3,
        excludeDir: ["cache", "dist"],
        excludeExt: [".bak"],
        compression: 9,
      });
    });

    test("turns blank or non-numeric numbers into NaN for the validator", () => {
      expect(extractInlineOptions({ "max-backups": "" }).maxBackups).toBeNaN();
      expect(extractInlineOptions({ "max-backups": "many" }).maxBackups).toBeNaN();
    });
  });

  describe("hasInlineOptions", () => {
    test("is false when nothing was given", () => {
      expect(hasInlineOptions({})).toBe(false);
      expect(hasInlineOptions(extractInlineOptions({}))).toBe(false);
    });

    test("is true when any option was given", () => {
      expect(hasInlineOptions({ cron: "0 * * * *" })).toBe(true);
    });
  });

  describe("buildInlineConfig", () => {
    test("maps options to config keys and resolves paths against cwd", () => {
      const config = buildInlineConfig(
        { source: "data", backupPath: "/var/backups", cron: "0 * * * *", maxBackups: 3, compression: 0 },
        "/work",
      );

      expect(config).toEqual({
        source_path: "/work/data",
        backup_path: "/var/backups",
        cron_expression: "0 * * * *",
        max_backups: 3,
        compression: 0,
      });
    });

    test("leaves unset options out", () => {
      expect(buildInlineConfig({}, "/work")).toEqual({});
    });
  });

  describe("mergeInlineConfig", () => {
    test("overrides scalars and appends exclusion lists", () => {
      const file = { ...DEFAULT_CONFIG, max_backups: 8, exclude_dirs: ["cache"], exclude_extensions: [".bak"] };

      const merged = mergeInlineConfig(file, { maxBackups: 2, excludeDir: ["dist"], excludeExt: [".swp"] }, "/work");

      expect(merged.max_backups).toBe(2);
      expect(merged.exclude_dirs).toEqual(["cache", "dist"]);
      expect(merged.exclude_extensions).toEqual([".bak", ".swp"]);
      expect(merged.cron_expression).toBe(DEFAULT_CONFIG.cron_expression);
    });

    test("keeps file values when no options are given", () => {
      const file = { ...DEFAULT_CONFIG, backup_path: "/var/backups" };

      expect(mergeInlineConfig(file, {}, "/work")).toEqual(file);
    });
  });
});
