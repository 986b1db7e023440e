/**
 * Room Registry: one row per active room, keyed by either of its channels.
 *
 * Rooms have no intermediate states: a row exists while the room is active and
 * is removed when either channel goes away. Hidden/visible is not stored; it is
 * recomputed from category + live occupancy on every reconciliation.
 */

import Database from "better-sqlite3";
import { DuplicateActiveRoomError, withStore } from "../errors.js";
import { log } from "../utils/logger.js";
import type { Room, VisibilityCategory } from "./types.js";

const roomLog = log.withScope("rooms");

const ROOM_COLUMNS =
  "room_id, text_channel_id, voice_channel_id, creator_id, created_at_ms, hidden_role_id, visibility_category, details";

export type CreateRoomInput = {
  textChannelId: string;
  voiceChannelId: string;
  creatorId: string;
  hiddenRoleId: string;
  category: VisibilityCategory;
  details: string;
};

/** Exactly one side is given: whichever channel triggered the deletion. */
export type DeleteRoomTarget = { textChannelId: string } | { voiceChannelId: string };

export type DeletedRoom = {
  hiddenRoleId: string;
  creatorId: string;
  otherChannelId: string;
};

function isCreatorUniqueViolation(err: unknown): boolean {
  return (
    err instanceof Database.SqliteError &&
    err.code === "SQLITE_CONSTRAINT_UNIQUE" &&
    err.message.includes("rooms.creator_id")
  );
}

/**
 * Insert a room after verifying the creator has none.
 * The check and the insert run in one transaction on the single connection.
 * @returns room_id
 */
export function createRoom(db: Database.Database, input: CreateRoomInput): number {
  const insert = db.transaction((row: CreateRoomInput, createdAtMs: number): number => {
    const existing = db
      .prepare("SELECT room_id FROM rooms WHERE creator_id = ? LIMIT 1")
      .get(row.creatorId) as { room_id: number } | undefined;
    if (existing) {
      throw new DuplicateActiveRoomError(row.creatorId);
    }

    const result = db
      .prepare(
        `INSERT INTO rooms (text_channel_id, voice_channel_id, creator_id, created_at_ms, hidden_role_id, visibility_category, details)
         VALUES (?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        row.textChannelId,
        row.voiceChannelId,
        row.creatorId,
        createdAtMs,
        row.hiddenRoleId,
        row.category,
        row.details
      );
    return Number(result.lastInsertRowid);
  });

  const roomId = withStore("rooms.create", () => {
    try {
      return insert(input, Date.now());
    } catch (err) {
      if (isCreatorUniqueViolation(err)) throw new DuplicateActiveRoomError(input.creatorId);
      throw err;
    }
  });

  roomLog.info(
    `Room ${roomId} created by ${input.creatorId}: text=${input.textChannelId} voice=${input.voiceChannelId}`
  );
  return roomId;
}

export function findRoomByCreator(db: Database.Database, creatorId: string): Room | null {
  const row = withStore("rooms.findByCreator", () =>
    db
      .prepare(`SELECT ${ROOM_COLUMNS} FROM rooms WHERE creator_id = ? LIMIT 1`)
      .get(creatorId) as Room | undefined
  );
  return row ?? null;
}

/**
 * Look up a room by either its text or its voice channel id.
 */
export function findRoomByChannel(db: Database.Database, channelId: string): Room | null {
  const row = withStore("rooms.findByChannel", () =>
    db
      .prepare(`SELECT ${ROOM_COLUMNS} FROM rooms WHERE text_channel_id = ? OR voice_channel_id = ? LIMIT 1`)
      .get(channelId, channelId) as Room | undefined
  );
  return row ?? null;
}

/**
 * Remove a room by the channel that triggered the deletion.
 * Returns what the caller needs to clean up the counterpart channel and role,
 * or null when no room matches.
 */
export function deleteRoom(db: Database.Database, target: DeleteRoomTarget): DeletedRoom | null {
  const channelId = "textChannelId" in target ? target.textChannelId : target.voiceChannelId;

  const remove = db.transaction((id: string): DeletedRoom | null => {
    const row = db
      .prepare(
        `SELECT room_id, text_channel_id, voice_channel_id, creator_id, hidden_role_id
         FROM rooms WHERE text_channel_id = ? OR voice_channel_id = ? LIMIT 1`
      )
      .get(id, id) as
      | Pick<Room, "room_id" | "text_channel_id" | "voice_channel_id" | "creator_id" | "hidden_role_id">
      | undefined;
    if (!row) return null;

    db.prepare("DELETE FROM rooms WHERE room_id = ?").run(row.room_id);

    return {
      hiddenRoleId: row.hidden_role_id,
      creatorId: row.creator_id,
      otherChannelId: row.text_channel_id === id ? row.voice_channel_id : row.text_channel_id,
    };
  });

  const deleted = withStore("rooms.delete", () => remove(channelId));
  if (deleted) {
    roomLog.info(`Room deleted via channel ${channelId} (creator=${deleted.creatorId})`);
  }
  return deleted;
}

export function listRooms(db: Database.Database): Room[] {
  return withStore("rooms.list", () =>
    db.prepare(`SELECT ${ROOM_COLUMNS} FROM rooms ORDER BY created_at_ms ASC, room_id ASC`).all() as Room[]
  );
}

export function listRoomsByCategory(db: Database.Database, categories: readonly VisibilityCategory[]): Room[] {
  if (categories.length === 0) return [];
  const placeholders = categories.map(() => "?").join(", ");
  return withStore("rooms.listByCategory", () =>
    db
      .prepare(
        `SELECT ${ROOM_COLUMNS} FROM rooms
         WHERE visibility_category IN (${placeholders})
         ORDER BY created_at_ms ASC, room_id ASC`
      )
      .all(...categories) as Room[]
  );
}

/**
 * @returns number of rows removed
 */
export function deleteAllRooms(db: Database.Database): number {
  const result = withStore("rooms.deleteAll", () => db.prepare("DELETE FROM rooms").run());
  roomLog.info(`Deleted all room records (${result.changes})`);
  return result.changes;
}
