/**
 * Admin Log: append-only audit trail of moderation and room actions.
 *
 * Rows are never updated. The only deletion path is the age-based retention
 * sweep (purgeAdminLogsOlderThan).
 */

import type Database from "better-sqlite3";
import type { AppContext } from "../context.js";
import { describeError, InvalidRequestError, withStore } from "../errors.js";
import { log } from "../utils/logger.js";

const auditLog = log.withScope("audit");

export const ADMIN_ACTIONS = [
  "blacklist_add",
  "blacklist_remove",
  "room_create",
  "room_delete",
  "room_auto_delete",
  "rooms_clear",
  "command_run",
  "button_click",
  "logs_purge",
] as const;

export type AdminAction = (typeof ADMIN_ACTIONS)[number];

export interface AdminLogEntry {
  log_id: number;
  action: AdminAction;
  actor_id: string | null; // null for system-originated actions
  target_id: string | null;
  details: string;
  created_at_ms: number;
}

export type AppendAdminLogInput = {
  action: AdminAction;
  actorId: string | null;
  targetId?: string | null;
  details?: string;
};

/**
 * Record an action. Never throws: product logic does not wait on the audit
 * trail, so a failed write only produces a local warning.
 * @returns whether the row was written
 */
export function appendAdminLog(db: Database.Database, entry: AppendAdminLogInput): boolean {
  const details = entry.details ?? "";
  try {
    db.prepare(
      "INSERT INTO admin_logs (action, actor_id, target_id, details, created_at_ms) VALUES (?, ?, ?, ?, ?)"
    ).run(entry.action, entry.actorId, entry.targetId ?? null, details, Date.now());
  } catch (err) {
    auditLog.warn(`Failed to record ${entry.action}: ${describeError(err)}`);
    return false;
  }

  auditLog.info(`${entry.action} actor=${entry.actorId ?? "system"} target=${entry.targetId ?? "-"}`, {
    details,
  });
  return true;
}

/**
 * Most recent entries first.
 */
export function recentAdminLogs(db: Database.Database, limit: number): AdminLogEntry[] {
  const capped = Math.max(0, Math.floor(limit));
  return withStore("adminLog.recent", () =>
    db
      .prepare(
        `SELECT log_id, action, actor_id, target_id, details, created_at_ms
         FROM admin_logs
         ORDER BY created_at_ms DESC, log_id DESC
         LIMIT ?`
      )
      .all(capped) as AdminLogEntry[]
  );
}

/**
 * Delete rows created strictly before cutoffMs.
 * @returns number of rows deleted
 */
export function purgeAdminLogsOlderThan(db: Database.Database, cutoffMs: number): number {
  const result = withStore("adminLog.purge", () =>
    db.prepare("DELETE FROM admin_logs WHERE created_at_ms < ?").run(cutoffMs)
  );
  if (result.changes > 0) {
    auditLog.info(`Purged ${result.changes} admin log rows older than ${new Date(cutoffMs).toISOString()}`);
  }
  return result.changes;
}

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Retention sweep entry point for the scheduler.
 * Removes rows older than `days` days and records the sweep itself.
 */
export function purgeLogsOlderThan(ctx: Pick<AppContext, "db">, days: number, actorId: string | null = null): number {
  if (!Number.isFinite(days) || days < 0) {
    throw new InvalidRequestError(`Invalid retention window: ${days}`, "The number of days must be zero or more.");
  }
  const cutoffMs = Date.now() - days * DAY_MS;
  const removed = purgeAdminLogsOlderThan(ctx.db, cutoffMs);
  appendAdminLog(ctx.db, {
    action: "logs_purge",
    actorId,
    details: `removed=${removed} older_than_days=${days}`,
  });
  return removed;
}
