import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import {
  enforceRetention,
  getCleanupCandidates,
  listBackups,
  readBackupFiles,
  validateDeletionCandidate,
} from "../../src/core/cleanup";
import type { BackupFileRecord } from "../../src/types";

vi.mock("node:fs/promises", async (importOriginal) => {
  const actual = await importOriginal<typeof import("node:fs/promises")>();
  return { ...actual, unlink: vi.fn(actual.unlink) };
});

const DAY_MS = 24 * 60 * 60 * 1000;
const BASE_TIME = new Date(2025, 0, 1, 12, 0, 0).getTime();

/**
 * Create a backup file whose mtime is `ageDays` before the base time
 */
async function createBackup(dir: string, name: string, ageDays: number): Promise<void> {
  const filePath = path.join(dir, name);
  await fs.writeFile(filePath, name);
  const mtime = new Date(BASE_TIME - ageDays * DAY_MS);
  await fs.utimes(filePath, mtime, mtime);
}

function record(fileName: string, modifiedAt: number): BackupFileRecord {
  return { fileName, path: `/backups/${fileName}`, sizeBytes: 1, modifiedAt: new Date(modifiedAt) };
}

describe("retention", () => {
  let tmpDir: string;

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "autobackup-retention-"));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  describe("readBackupFiles", () => {
    test("lists only files matching the archive pattern, oldest first", async () => {
      await createBackup(tmpDir, "backup_20250103_000000.zip", 1);
      await createBackup(tmpDir, "backup_20250101_000000.zip", 3);
      await createBackup(tmpDir, "backup_20250102_000000.zip", 2);
      await createBackup(tmpDir, "notes.zip", 10);
      await createBackup(tmpDir, "backup_20250101_000000.zip.part", 10);
      await fs.mkdir(path.join(tmpDir, "backup_20240101_000000.zip"));

      const files = await readBackupFiles(tmpDir);

      expect(files.map((f) => f.fileName)).toEqual([
        "backup_20250101_000000.zip",
        "backup_20250102_000000.zip",
        "backup_20250103_000000.zip",
      ]);
      expect(files[0]?.sizeBytes).toBe("backup_20250101_000000.zip".length);
    });

    test("orders by modification time, not by name", async () => {
      await createBackup(tmpDir, "backup_20250101_000000.zip", 1);
      await createBackup(tmpDir, "backup_20250105_000000.zip", 5);

      const files = await readBackupFiles(tmpDir);

      expect(files.map((f) => f.fileName)).toEqual([
        "backup_20250105_000000.zip",
        "backup_20250101_000000.zip",
      ]);
    });

    test("breaks timestamp ties by file name", async () => {
      await createBackup(tmpDir, "backup_20250102_000000.zip", 1);
      await createBackup(tmpDir, "backup_20250101_000000.zip", 1);

      const files = await readBackupFiles(tmpDir);

      expect(files.map((f) => f.fileName)).toEqual([
        "backup_20250101_000000.zip",
        "backup_20250102_000000.zip",
      ]);
    });

    test("returns an empty list for a missing directory", async () => {
      expect(await readBackupFiles(path.join(tmpDir, "missing"))).toEqual([]);
    });

    test("respects a custom prefix", async () => {
      await createBackup(tmpDir, "site_20250101_000000.zip", 1);
      await createBackup(tmpDir, "backup_20250101_000000.zip", 1);

      const files = await readBackupFiles(tmpDir, "site");

      expect(files.map((f) => f.fileName)).toEqual(["site_20250101_000000.zip"]);
    });
  });

  describe("listBackups", () => {
    test("returns newest first and leaves the directory alone", async () => {
      await createBackup(tmpDir, "backup_20250101_000000.zip", 2);
      await createBackup(tmpDir, "backup_20250102_000000.zip", 1);

      const first = await listBackups(tmpDir);
      const second = await listBackups(tmpDir);

      expect(first.map((f) => f.fileName)).toEqual([
        "backup_20250102_000000.zip",
        "backup_20250101_000000.zip",
      ]);
      expect(second).toEqual(first);
    });
  });

  describe("getCleanupCandidates", () => {
    test("returns the oldest surplus", () => {
      const backups = [record("c", 3), record("a", 1), record("b", 2)];

      expect(getCleanupCandidates(backups, 2).map((b) => b.fileName)).toEqual(["a"]);
      expect(getCleanupCandidates(backups, 1).map((b) => b.fileName)).toEqual(["a", "b"]);
    });

    test("returns nothing when within the limit", () => {
      expect(getCleanupCandidates([record("a", 1)], 1)).toEqual([]);
      expect(getCleanupCandidates([], 5)).toEqual([]);
    });
  });

  describe("validateDeletionCandidate", () => {
    test("accepts a matching file inside the directory", () => {
      const result = validateDeletionCandidate(
        record("backup_20250101_000000.zip", 1),
        "/backups",
        "backup",
      );
      expect(result).toEqual({ valid: true, errors: [] });
    });

    test("rejects foreign names and paths outside the directory", () => {
      const foreign = validateDeletionCandidate(record("notes.zip", 1), "/backups", "backup");
      expect(foreign.valid).toBe(false);
      expect(foreign.errors).toHaveLength(1);

      const outside = validateDeletionCandidate(
        { ...record("backup_20250101_000000.zip", 1), path: "/etc/backup_20250101_000000.zip" },
        "/backups",
        "backup",
      );
      expect(outside.valid).toBe(false);
      expect(outside.errors[0]).toContain("outside backup directory");
    });
  });

  describe("enforceRetention", () => {
    test("deletes the oldest surplus until maxBackups remain", async () => {
      for (let day = 1; day <= 6; day++) {
        await createBackup(tmpDir, `backup_2025010${day}_000000.zip`, 7 - day);
      }
      await createBackup(tmpDir, "unrelated.txt", 100);

      const result = await enforceRetention(tmpDir, 5);

      expect(result).toEqual({ deleted: ["backup_20250101_000000.zip"], failures: [] });
      expect((await fs.readdir(tmpDir)).sort()).toEqual([
        "backup_20250102_000000.zip",
        "backup_20250103_000000.zip",
        "backup_20250104_000000.zip",
        "backup_20250105_000000.zip",
        "backup_20250106_000000.zip",
        "unrelated.txt",
      ]);
    });

    test("is a no-op at or under the limit", async () => {
      await createBackup(tmpDir, "backup_20250101_000000.zip", 1);
      await createBackup(tmpDir, "backup_20250102_000000.zip", 0);

      const result = await enforceRetention(tmpDir, 2);

      expect(result).toEqual({ deleted: [], failures: [] });
      expect(await fs.readdir(tmpDir)).toHaveLength(2);
    });

    test("keeps exactly one with maxBackups 1", async () => {
      await createBackup(tmpDir, "backup_20250101_000000.zip", 3);
      await createBackup(tmpDir, "backup_20250102_000000.zip", 2);
      await createBackup(tmpDir, "backup_20250103_000000.zip", 1);

      const result = await enforceRetention(tmpDir, 1);

      expect(result.deleted).toEqual(["backup_20250101_000000.zip", "backup_20250102_000000.zip"]);
      expect(await fs.readdir(tmpDir)).toEqual(["backup_20250103_000000.zip"]);
    });

    test("dry run reports without deleting", async () => {
      await createBackup(tmpDir, "backup_20250101_000000.zip", 2);
      await createBackup(tmpDir, "backup_20250102_000000.zip", 1);

      const result = await enforceRetention(tmpDir, 1, { dryRun: true });

      expect(result.deleted).toEqual(["backup_20250101_000000.zip"]);
      expect(await fs.readdir(tmpDir)).toHaveLength(2);
    });

    test("records a failed delete and continues with the rest", async () => {
      await createBackup(tmpDir, "backup_20250101_000000.zip", 3);
      await createBackup(tmpDir, "backup_20250102_000000.zip", 2);
      await createBackup(tmpDir, "backup_20250103_000000.zip", 1);

      vi.mocked(fs.unlink).mockRejectedValueOnce(
        Object.assign(new Error("operation not permitted"), { code: "EPERM" }),
      );

      const result = await enforceRetention(tmpDir, 1);

      expect(result.deleted).toEqual(["backup_20250102_000000.zip"]);
      expect(result.failures).toEqual([
        {
          fileName: "backup_20250101_000000.zip",
          path: path.join(tmpDir, "backup_20250101_000000.zip"),
          error: "operation not permitted",
        },
      ]);
    });

    test("rejects a limit below one", async () => {
      await expect(enforceRetention(tmpDir, 0)).rejects.toThrow(RangeError);
    });
  });
});
