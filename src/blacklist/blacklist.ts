/**
 * Per-user block lists.
 *
 * A creator's list is read when their room is provisioned (hidden role grants)
 * and on every reconciliation (explicit member denies).
 */

import type Database from "better-sqlite3";
import { withStore } from "../errors.js";
import { log } from "../utils/logger.js";

const blacklistLog = log.withScope("blacklist");

export type BlacklistEntry = {
  owner_id: string;
  blocked_user_id: string;
  reason: string;
  created_at_ms: number;
};

/**
 * Block a user. Re-blocking the same user refreshes reason and timestamp.
 */
export function blockUser(db: Database.Database, ownerId: string, blockedId: string, reason: string): void {
  const now = Date.now();
  withStore("blacklist.block", () =>
    db
      .prepare(
        `INSERT INTO user_blacklists (owner_id, blocked_user_id, reason, created_at_ms)
         VALUES (?, ?, ?, ?)
         ON CONFLICT (owner_id, blocked_user_id)
         DO UPDATE SET reason = excluded.reason, created_at_ms = excluded.created_at_ms`
      )
      .run(ownerId, blockedId, reason, now)
  );
  blacklistLog.info(`owner=${ownerId} blocked user=${blockedId}`, { reason });
}

/**
 * @returns true if the user was blocked before this call
 */
export function unblockUser(db: Database.Database, ownerId: string, blockedId: string): boolean {
  const result = withStore("blacklist.unblock", () =>
    db
      .prepare("DELETE FROM user_blacklists WHERE owner_id = ? AND blocked_user_id = ?")
      .run(ownerId, blockedId)
  );
  const removed = result.changes > 0;
  if (removed) {
    blacklistLog.info(`owner=${ownerId} unblocked user=${blockedId}`);
  }
  return removed;
}

export function listBlocked(db: Database.Database, ownerId: string): string[] {
  const rows = withStore("blacklist.list", () =>
    db
      .prepare("SELECT blocked_user_id FROM user_blacklists WHERE owner_id = ?")
      .all(ownerId) as Array<{ blocked_user_id: string }>
  );
  return rows.map((r) => r.blocked_user_id);
}

export function listBlacklistEntries(db: Database.Database, ownerId: string): BlacklistEntry[] {
  return withStore("blacklist.entries", () =>
    db
      .prepare(
        `SELECT owner_id, blocked_user_id, reason, created_at_ms
         FROM user_blacklists
         WHERE owner_id = ?
         ORDER BY created_at_ms ASC, blocked_user_id ASC`
      )
      .all(ownerId) as BlacklistEntry[]
  );
}

export function isBlocked(db: Database.Database, ownerId: string, userId: string): boolean {
  const row = withStore("blacklist.isBlocked", () =>
    db
      .prepare("SELECT 1 AS hit FROM user_blacklists WHERE owner_id = ? AND blocked_user_id = ? LIMIT 1")
      .get(ownerId, userId) as { hit: number } | undefined
  );
  return row !== undefined;
}
