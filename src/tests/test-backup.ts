import fs from "node:fs";
import path from "node:path";
import { DateTime } from "luxon";
import { afterEach, beforeEach, expect, test, vi } from "vitest";
import { appendAdminLog, recentAdminLogs } from "../audit/adminLog.js";
import {
  backupFileName,
  isDailyBackupTaskRunning,
  msUntilNextRun,
  pruneBackups,
  runBackup,
  runDailyMaintenance,
  startDailyBackupTask,
  stopDailyBackupTask,
} from "../backup/dailyBackup.js";
import { openTestDb, type TestDb } from "./helpers/testDb.js";

const DAY_MS = 24 * 60 * 60 * 1000;
const HOUR_MS = 60 * 60 * 1000;

let t: TestDb;
let backupsDir: string;

beforeEach(() => {
  t = openTestDb("rooms-backup-");
  backupsDir = path.join(t.dir, "backups");
});

afterEach(() => {
  stopDailyBackupTask();
  vi.useRealTimers();
  t.cleanup();
});

test("backup files are named by local timestamp", () => {
  const at = DateTime.fromObject({ year: 2026, month: 5, day: 1, hour: 9, minute: 5, second: 7 });
  expect(backupFileName(at)).toBe("rooms_2026-05-01_09-05-07.sqlite");
});

test("a backup is a readable copy of the database", async () => {
  appendAdminLog(t.db, { action: "room_create", actorId: "100000000000000001" });

  const { filePath } = await runBackup({ db: t.db, backupsDir, retentionDays: 7 });

  expect(path.dirname(filePath)).toBe(backupsDir);
  expect(path.basename(filePath)).toMatch(/^rooms_\d{4}-\d{2}-\d{2}_\d{2}-\d{2}-\d{2}\.sqlite$/);
  expect(fs.statSync(filePath).size).toBeGreaterThan(0);
});

test("pruning removes old backups and leaves other files alone", () => {
  fs.mkdirSync(backupsDir, { recursive: true });
  const now = Date.now();
  const old = path.join(backupsDir, "rooms_2026-01-01_12-00-00.sqlite");
  const fresh = path.join(backupsDir, "rooms_2026-01-09_12-00-00.sqlite");
  const unrelated = path.join(backupsDir, "notes.txt");
  for (const file of [old, fresh, unrelated]) fs.writeFileSync(file, "x");

  const oldTime = new Date(now - 8 * DAY_MS);
  fs.utimesSync(old, oldTime, oldTime);
  fs.utimesSync(unrelated, oldTime, oldTime);

  expect(pruneBackups(backupsDir, 7, now)).toEqual(["rooms_2026-01-01_12-00-00.sqlite"]);
  expect(fs.readdirSync(backupsDir).sort()).toEqual(["notes.txt", "rooms_2026-01-09_12-00-00.sqlite"]);
});

test("the next run is later today or tomorrow at the configured hour", () => {
  const at = (hour: number, minute = 0) =>
    DateTime.fromObject({ year: 2026, month: 5, day: 1, hour, minute }, { zone: "utc" });

  expect(msUntilNextRun(at(10, 30), 12)).toBe(1.5 * HOUR_MS);
  expect(msUntilNextRun(at(12), 12)).toBe(24 * HOUR_MS);
  expect(msUntilNextRun(at(13), 12)).toBe(23 * HOUR_MS);
});

test("a daily run backs up, publishes and purges old admin logs", async () => {
  const publish = vi.fn(async (_filePath: string) => {});

  await runDailyMaintenance({
    db: t.db,
    backupsDir,
    retentionDays: 7,
    hour: 12,
    adminLogRetentionDays: 90,
    publish,
  });

  expect(publish).toHaveBeenCalledTimes(1);
  expect(fs.readdirSync(backupsDir)).toHaveLength(1);
  expect(recentAdminLogs(t.db, 1)[0]?.action).toBe("logs_purge");
});

test("a publish failure does not stop the log purge", async () => {
  await expect(
    runDailyMaintenance({
      db: t.db,
      backupsDir,
      retentionDays: 7,
      hour: 12,
      adminLogRetentionDays: 30,
      publish: async () => {
        throw new Error("channel gone");
      },
    })
  ).resolves.toBeUndefined();

  expect(recentAdminLogs(t.db, 1)[0]?.details).toBe("removed=0 older_than_days=30");
});

test("a zero admin log retention skips the purge", async () => {
  await runDailyMaintenance({ db: t.db, backupsDir, retentionDays: 7, hour: 12, adminLogRetentionDays: 0 });

  expect(recentAdminLogs(t.db, 10)).toEqual([]);
});

test("starting the task twice keeps a single schedule", () => {
  vi.useFakeTimers();
  const opts = { db: t.db, backupsDir, retentionDays: 7, hour: 12, adminLogRetentionDays: 0 };

  startDailyBackupTask(opts);
  startDailyBackupTask(opts);

  expect(vi.getTimerCount()).toBe(1);
  stopDailyBackupTask();
  expect(isDailyBackupTaskRunning()).toBe(false);
  expect(vi.getTimerCount()).toBe(0);
});
