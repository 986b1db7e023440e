/**
 * Room provisioning: category, anonymous hidden role, paired channels, record.
 *
 * The one-room-per-creator check runs before any platform call. Anything that
 * fails after the first platform resource exists is rolled back (channels,
 * role, empty category) before the error reaches the user.
 */

import { createHash, randomBytes } from "node:crypto";
import { appendAdminLog } from "../audit/adminLog.js";
import { listBlocked } from "../blacklist/blacklist.js";
import type { GuildContext, RoomSettings } from "../context.js";
import {
  BotError,
  describeError,
  DuplicateActiveRoomError,
  ExternalApiFailureError,
  PersistenceFailureError,
} from "../errors.js";
import type { OverwriteRule } from "../platform/types.js";
import { parseRequest, roomCreateRequestSchema, type RoomCreateRequest } from "../requests.js";
import { log } from "../utils/logger.js";
import { reconcileRoom, type ReconcileOutcome } from "./reconcile.js";
import { createRoom, deleteRoom, findRoomByCreator } from "./registry.js";
import type { Room, ViewerGroup } from "./types.js";

const roomLog = log.withScope("rooms");

export type ProvisionedRoom = {
  room: Room;
  reconcile: ReconcileOutcome;
};

type CreatedResources = {
  categoryId?: string;
  roleId?: string;
  textChannelId?: string;
  voiceChannelId?: string;
};

/**
 * Role names carry no trace of the creator: 12 hex chars of a salted hash.
 */
export function hiddenRoleName(creatorId: string): string {
  const salt = randomBytes(8).toString("hex");
  return createHash("sha256").update(`${salt}:${creatorId}`).digest("hex").slice(0, 12);
}

export function roomBaseName(displayName: string): string {
  return `${displayName}'s room`;
}

export function roomCategoryName(displayName: string, creatorId: string): string {
  return `${displayName}'s rooms-${creatorId}`;
}

export function creatorGroupLabel(groups: readonly ViewerGroup[], settings: RoomSettings): string {
  const inA = groups.includes("a");
  const inB = groups.includes("b");
  if (inA && inB) return `${settings.groupALabel} & ${settings.groupBLabel}`;
  if (inA) return settings.groupALabel;
  if (inB) return settings.groupBLabel;
  return "unspecified";
}

export function buildAnnouncement(opts: {
  creatorId: string;
  groupLabel: string;
  details: string;
  noticeRoleId: string | null;
}): string {
  const lines = [`<@${opts.creatorId}> (${opts.groupLabel}) is looking for someone to talk with!`, ""];
  if (opts.details.trim()) {
    lines.push("📝 Details", opts.details, "");
  }
  if (opts.noticeRoleId) {
    lines.push(`<@&${opts.noticeRoleId}>`);
  }
  lines.push("The room creator can delete this room with `/delete-room`.");
  return lines.join("\n");
}

async function rollback(ctx: GuildContext, created: CreatedResources): Promise<void> {
  const steps: Array<[string, string | undefined, (id: string) => Promise<unknown>]> = [
    ["room record", created.textChannelId, async (id) => deleteRoom(ctx.db, { textChannelId: id })],
    ["voice channel", created.voiceChannelId, (id) => ctx.platform.deleteChannel(id)],
    ["text channel", created.textChannelId, (id) => ctx.platform.deleteChannel(id)],
    ["role", created.roleId, (id) => ctx.platform.deleteRole(id)],
    ["category", created.categoryId, (id) => ctx.platform.deleteCategoryIfEmpty(id)],
  ];

  for (const [label, id, undo] of steps) {
    if (!id) continue;
    try {
      await undo(id);
      roomLog.info(`Rolled back ${label} ${id}`);
    } catch (err) {
      roomLog.error(`Rollback of ${label} ${id} failed: ${describeError(err)}`);
    }
  }
}

async function grantHiddenRole(ctx: GuildContext, creatorId: string, roleId: string): Promise<void> {
  const blockedMembers = await ctx.platform.filterGuildMembers(listBlocked(ctx.db, creatorId));
  for (const userId of blockedMembers) {
    try {
      await ctx.platform.addMemberRole(userId, roleId);
      roomLog.debug(`Granted hidden role ${roleId} to ${userId}`);
    } catch (err) {
      roomLog.error(`Could not grant hidden role ${roleId} to ${userId}: ${describeError(err)}`);
    }
  }
}

async function announce(ctx: GuildContext, room: Room, groups: readonly ViewerGroup[]): Promise<void> {
  try {
    const noticeRoleId = ctx.settings.noticeRoleName
      ? await ctx.platform.findRoleIdByName(ctx.settings.noticeRoleName)
      : null;
    await ctx.platform.sendMessage(
      room.text_channel_id,
      buildAnnouncement({
        creatorId: room.creator_id,
        groupLabel: creatorGroupLabel(groups, ctx.settings),
        details: room.details,
        noticeRoleId,
      })
    );
  } catch (err) {
    roomLog.warn(`Announcement for room ${room.room_id} failed: ${describeError(err)}`);
  }
}

/**
 * Create a room for a member who pressed a lobby button and submitted the details modal.
 */
export async function onRoomCreateRequested(
  ctx: GuildContext,
  request: RoomCreateRequest,
  creatorGroups: readonly ViewerGroup[] = []
): Promise<ProvisionedRoom> {
  const { creatorId, creatorDisplayName, category, details } = parseRequest(
    roomCreateRequestSchema,
    request,
    "room create request"
  );

  if (ctx.inFlightCreators.has(creatorId) || findRoomByCreator(ctx.db, creatorId)) {
    throw new DuplicateActiveRoomError(creatorId);
  }

  ctx.inFlightCreators.add(creatorId);
  const created: CreatedResources = {};
  try {
    created.categoryId = await ctx.platform.ensureCategory(roomCategoryName(creatorDisplayName, creatorId));

    const roleName = hiddenRoleName(creatorId);
    created.roleId = await ctx.platform.createRole(roleName);
    roomLog.info(`Created hidden role ${roleName} (${created.roleId}) for ${creatorId}`);

    await grantHiddenRole(ctx, creatorId, created.roleId);

    const hiddenDeny: OverwriteRule[] = [
      { principal: { kind: "role", id: created.roleId }, decision: "deny", source: "hidden_role" },
    ];
    const baseName = roomBaseName(creatorDisplayName);
    created.textChannelId = await ctx.platform.createChannel({
      kind: "text",
      name: `${baseName}-chat`,
      parentId: created.categoryId,
      overwrites: hiddenDeny,
    });
    created.voiceChannelId = await ctx.platform.createChannel({
      kind: "voice",
      name: `${baseName}-voice`,
      parentId: created.categoryId,
      overwrites: hiddenDeny,
    });

    createRoom(ctx.db, {
      textChannelId: created.textChannelId,
      voiceChannelId: created.voiceChannelId,
      creatorId,
      hiddenRoleId: created.roleId,
      category,
      details,
    });

    const room = findRoomByCreator(ctx.db, creatorId);
    if (!room) {
      throw new PersistenceFailureError("rooms.create", `room for ${creatorId} missing after insert`);
    }

    appendAdminLog(ctx.db, {
      action: "room_create",
      actorId: creatorId,
      details: `text=${room.text_channel_id} voice=${room.voice_channel_id} category=${category}`,
    });

    const reconcile = await reconcileRoom(ctx, room);
    await announce(ctx, room, creatorGroups);

    return { room, reconcile };
  } catch (err) {
    roomLog.error(`Room creation for ${creatorId} failed: ${describeError(err)}`);
    await rollback(ctx, created);
    throw err instanceof BotError ? err : new ExternalApiFailureError("room.provision", err);
  } finally {
    ctx.inFlightCreators.delete(creatorId);
  }
}
