/**
 * Room teardown: explicit deletion, cascade after a channel disappears, admin wipe.
 *
 * The record is always removed before any channel, so the channelDelete events
 * our own deletions trigger find nothing and do not cascade a second time.
 */

import { appendAdminLog } from "../audit/adminLog.js";
import type { GuildContext } from "../context.js";
import { describeError, NotAuthorizedError, RoomNotFoundError } from "../errors.js";
import {
  parseRequest,
  roomChannelDeletedSchema,
  roomDeleteRequestSchema,
  type RoomChannelDeleted,
  type RoomDeleteRequest,
} from "../requests.js";
import { log } from "../utils/logger.js";
import { deleteAllRooms, deleteRoom, findRoomByChannel, listRooms } from "./registry.js";

const roomLog = log.withScope("rooms");

export type RoomTeardownResult = {
  creatorId: string;
  textChannelId: string;
  voiceChannelId: string;
  failures: string[];
};

export type ClearRoomsResult = {
  removed: number;
  failures: string[];
};

async function parentOf(ctx: GuildContext, channelId: string): Promise<string | null> {
  try {
    return await ctx.platform.getParentId(channelId);
  } catch (err) {
    roomLog.warn(`Could not read parent of ${channelId}: ${describeError(err)}`);
    return null;
  }
}

/**
 * Delete channels (in order), then the role, then the category if it is empty.
 * Each step is attempted regardless of earlier failures.
 */
async function destroyRoomResources(
  ctx: GuildContext,
  resources: { channelIds: string[]; roleId: string; categoryId: string | null }
): Promise<string[]> {
  const failures: string[] = [];

  for (const channelId of resources.channelIds) {
    try {
      await ctx.platform.deleteChannel(channelId);
      roomLog.info(`Deleted channel ${channelId}`);
    } catch (err) {
      failures.push(`channel ${channelId}: ${describeError(err)}`);
    }
  }

  try {
    await ctx.platform.deleteRole(resources.roleId);
    roomLog.info(`Deleted role ${resources.roleId}`);
  } catch (err) {
    failures.push(`role ${resources.roleId}: ${describeError(err)}`);
  }

  if (resources.categoryId) {
    try {
      if (await ctx.platform.deleteCategoryIfEmpty(resources.categoryId)) {
        roomLog.info(`Deleted empty category ${resources.categoryId}`);
      }
    } catch (err) {
      failures.push(`category ${resources.categoryId}: ${describeError(err)}`);
    }
  }

  if (failures.length > 0) {
    roomLog.error("Some room resources could not be deleted", { failures });
  }
  return failures;
}

/**
 * /delete-room: only the creator or an administrator may delete a room.
 * The text channel is deleted last since the command usually runs inside it.
 */
export async function onRoomDeleteRequested(ctx: GuildContext, request: RoomDeleteRequest): Promise<RoomTeardownResult> {
  const { channelId, requesterId, requesterIsAdmin } = parseRequest(
    roomDeleteRequestSchema,
    request,
    "room delete request"
  );

  const room = findRoomByChannel(ctx.db, channelId);
  if (!room) throw new RoomNotFoundError(channelId);
  if (room.creator_id !== requesterId && !requesterIsAdmin) {
    throw new NotAuthorizedError(requesterId, `delete room ${room.room_id}`);
  }

  const categoryId = await parentOf(ctx, room.text_channel_id);
  deleteRoom(ctx.db, { textChannelId: room.text_channel_id });

  const failures = await destroyRoomResources(ctx, {
    channelIds: [room.voice_channel_id, room.text_channel_id],
    roleId: room.hidden_role_id,
    categoryId,
  });

  appendAdminLog(ctx.db, {
    action: "room_delete",
    actorId: requesterId,
    targetId: room.creator_id,
    details: `text=${room.text_channel_id} voice=${room.voice_channel_id}`,
  });

  return {
    creatorId: room.creator_id,
    textChannelId: room.text_channel_id,
    voiceChannelId: room.voice_channel_id,
    failures,
  };
}

/**
 * Cascade after one side of a room was deleted outside the bot (or by a moderator).
 * System-initiated: logs only, never throws.
 * @returns the removed room's identifiers, or null when the channel was not a room
 */
export async function onRoomChannelDeleted(
  ctx: GuildContext,
  event: RoomChannelDeleted
): Promise<RoomTeardownResult | null> {
  try {
    const { channelId, side, parentId } = parseRequest(roomChannelDeletedSchema, event, "channel deletion");
    const deleted = deleteRoom(ctx.db, side === "text" ? { textChannelId: channelId } : { voiceChannelId: channelId });
    if (!deleted) return null;

    const failures = await destroyRoomResources(ctx, {
      channelIds: [deleted.otherChannelId],
      roleId: deleted.hiddenRoleId,
      categoryId: parentId,
    });

    appendAdminLog(ctx.db, {
      action: "room_auto_delete",
      actorId: null,
      targetId: deleted.creatorId,
      details: `channel=${channelId}`,
    });

    return {
      creatorId: deleted.creatorId,
      textChannelId: side === "text" ? channelId : deleted.otherChannelId,
      voiceChannelId: side === "voice" ? channelId : deleted.otherChannelId,
      failures,
    };
  } catch (err) {
    roomLog.error(`Cleanup after deletion of ${event.channelId} failed: ${describeError(err)}`);
    return null;
  }
}

/**
 * Admin wipe of every room in the registry.
 */
export async function clearAllRooms(ctx: GuildContext, actorId: string): Promise<ClearRoomsResult> {
  const rooms = listRooms(ctx.db);
  if (rooms.length === 0) return { removed: 0, failures: [] };

  const categories = new Map<number, string | null>();
  for (const room of rooms) {
    categories.set(room.room_id, await parentOf(ctx, room.text_channel_id));
  }

  const removed = deleteAllRooms(ctx.db);

  const failures: string[] = [];
  for (const room of rooms) {
    failures.push(
      ...(await destroyRoomResources(ctx, {
        channelIds: [room.text_channel_id, room.voice_channel_id],
        roleId: room.hidden_role_id,
        categoryId: categories.get(room.room_id) ?? null,
      }))
    );
  }

  appendAdminLog(ctx.db, {
    action: "rooms_clear",
    actorId,
    details: `removed=${removed}`,
  });

  return { removed, failures };
}
