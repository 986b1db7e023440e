/**
 * Daily backup: snapshot the database once a day at a fixed local hour,
 * prune old snapshots, optionally post the file to a channel, and apply the
 * admin log retention.
 */

import fs from "node:fs";
import path from "node:path";
import type Database from "better-sqlite3";
import { DateTime } from "luxon";
import { purgeLogsOlderThan } from "../audit/adminLog.js";
import { describeError } from "../errors.js";
import { log } from "../utils/logger.js";

const backupLog = log.withScope("backup");

const DAY_MS = 24 * 60 * 60 * 1000;
const BACKUP_FILE_PATTERN = /^rooms_.+\.sqlite$/;

export type BackupOptions = {
  db: Database.Database;
  backupsDir: string;
  retentionDays: number;
};

export type BackupResult = {
  filePath: string;
  pruned: string[];
};

export type DailyBackupTaskOptions = BackupOptions & {
  hour: number;
  /** 0 disables the admin log purge. */
  adminLogRetentionDays: number;
  /** Receives each new backup file, e.g. to post it to a channel. */
  publish?: (filePath: string) => Promise<void>;
};

let nextRun: NodeJS.Timeout | null = null;

export function backupFileName(at: DateTime): string {
  return `rooms_${at.toFormat("yyyy-LL-dd_HH-mm-ss")}.sqlite`;
}

/**
 * Delete backup files whose mtime is older than the retention window.
 * Files not named like a backup are left alone.
 */
export function pruneBackups(backupsDir: string, retentionDays: number, nowMs = Date.now()): string[] {
  const cutoff = nowMs - retentionDays * DAY_MS;
  const pruned: string[] = [];
  for (const name of fs.readdirSync(backupsDir)) {
    if (!BACKUP_FILE_PATTERN.test(name)) continue;
    const filePath = path.join(backupsDir, name);
    if (fs.statSync(filePath).mtimeMs < cutoff) {
      fs.unlinkSync(filePath);
      pruned.push(name);
    }
  }
  if (pruned.length > 0) {
    backupLog.info(`Pruned ${pruned.length} old backup(s)`, { pruned });
  }
  return pruned;
}

export async function runBackup(opts: BackupOptions): Promise<BackupResult> {
  fs.mkdirSync(opts.backupsDir, { recursive: true });
  const filePath = path.join(opts.backupsDir, backupFileName(DateTime.now()));
  await opts.db.backup(filePath);
  backupLog.info(`Backup written to ${filePath}`);
  return { filePath, pruned: pruneBackups(opts.backupsDir, opts.retentionDays) };
}

/**
 * Milliseconds from now until the next occurrence of hour:00 local time.
 * Exactly on the hour counts as already passed.
 */
export function msUntilNextRun(now: DateTime, hour: number): number {
  let next = now.set({ hour, minute: 0, second: 0, millisecond: 0 });
  if (next <= now) next = next.plus({ days: 1 });
  return next.toMillis() - now.toMillis();
}

/**
 * One scheduled run. Each stage is independent: a failed backup still lets the
 * log purge run. Errors are logged, never thrown.
 */
export async function runDailyMaintenance(opts: DailyBackupTaskOptions): Promise<void> {
  try {
    const { filePath } = await runBackup(opts);
    if (opts.publish) {
      try {
        await opts.publish(filePath);
      } catch (err) {
        backupLog.error(`Posting backup failed: ${describeError(err)}`);
      }
    }
  } catch (err) {
    backupLog.error(`Backup failed: ${describeError(err)}`);
  }

  if (opts.adminLogRetentionDays > 0) {
    try {
      purgeLogsOlderThan({ db: opts.db }, opts.adminLogRetentionDays);
    } catch (err) {
      backupLog.error(`Admin log purge failed: ${describeError(err)}`);
    }
  }
}

function schedule(opts: DailyBackupTaskOptions): void {
  const delay = msUntilNextRun(DateTime.now(), opts.hour);
  backupLog.debug(`Next backup in ${Math.round(delay / 60000)} minutes`);
  nextRun = setTimeout(() => {
    runDailyMaintenance(opts)
      .catch((err) => backupLog.error(`Daily run failed: ${describeError(err)}`))
      .finally(() => {
        if (nextRun) schedule(opts);
      });
  }, delay);
}

/**
 * Start the daily task.
 * Safe to call multiple times (idempotent).
 */
export function startDailyBackupTask(opts: DailyBackupTaskOptions): void {
  if (nextRun) {
    backupLog.warn("Backup task already running");
    return;
  }
  backupLog.info(`Starting daily backup at ${String(opts.hour).padStart(2, "0")}:00 (keep ${opts.retentionDays} days)`);
  schedule(opts);
}

export function stopDailyBackupTask(): void {
  if (nextRun) {
    clearTimeout(nextRun);
    nextRun = null;
    backupLog.debug("Backup task stopped");
  }
}

export function isDailyBackupTaskRunning(): boolean {
  return nextRun !== null;
}
