/**
 * Block and unblock entry points for /bl-add and /bl-remove.
 *
 * When the owner has an active room the change is pushed to it right away:
 * the hidden role is granted or revoked and the room is reconciled.
 */

import { appendAdminLog } from "../audit/adminLog.js";
import type { GuildContext } from "../context.js";
import { describeError, InvalidRequestError } from "../errors.js";
import {
  blockRequestSchema,
  parseRequest,
  unblockRequestSchema,
  type BlockRequest,
  type UnblockRequest,
} from "../requests.js";
import { reconcileRoom } from "../rooms/reconcile.js";
import { findRoomByCreator } from "../rooms/registry.js";
import { log } from "../utils/logger.js";
import { blockUser, unblockUser } from "./blacklist.js";

const blacklistLog = log.withScope("blacklist");

type RoleChange = "grant" | "revoke";

async function isGuildMember(ctx: GuildContext, userId: string): Promise<boolean> {
  const [member] = await ctx.platform.filterGuildMembers([userId]);
  return member !== undefined;
}

/**
 * Push a blacklist change into the owner's active room, if any.
 * Role failures are logged; the stored list is already updated.
 */
async function syncActiveRoom(ctx: GuildContext, ownerId: string, targetId: string, change: RoleChange): Promise<void> {
  const room = findRoomByCreator(ctx.db, ownerId);
  if (!room) return;

  try {
    if (change === "grant") {
      await ctx.platform.addMemberRole(targetId, room.hidden_role_id);
    } else if (await isGuildMember(ctx, targetId)) {
      await ctx.platform.removeMemberRole(targetId, room.hidden_role_id);
    }
  } catch (err) {
    blacklistLog.error(`Hidden role ${change} for ${targetId} in room ${room.room_id} failed: ${describeError(err)}`);
  }
  await reconcileRoom(ctx, room);
}

export async function onBlockRequested(ctx: GuildContext, request: BlockRequest): Promise<void> {
  const { ownerId, targetId, reason } = parseRequest(blockRequestSchema, request, "block request");
  if (ownerId === targetId) {
    throw new InvalidRequestError(`User ${ownerId} tried to block themselves`, "You cannot block yourself.");
  }
  if (targetId === ctx.platform.serviceUserId) {
    throw new InvalidRequestError(`User ${ownerId} tried to block the bot`, "You cannot block the bot.");
  }
  if (!(await isGuildMember(ctx, targetId))) {
    throw new InvalidRequestError(
      `User ${ownerId} tried to block non-member ${targetId}`,
      "That user is not a member of this server."
    );
  }

  blockUser(ctx.db, ownerId, targetId, reason);
  appendAdminLog(ctx.db, { action: "blacklist_add", actorId: ownerId, targetId, details: reason });
  await syncActiveRoom(ctx, ownerId, targetId, "grant");
}

/**
 * @returns false when the target was not on the owner's list
 */
export async function onUnblockRequested(ctx: GuildContext, request: UnblockRequest): Promise<boolean> {
  const { ownerId, targetId } = parseRequest(unblockRequestSchema, request, "unblock request");

  if (!unblockUser(ctx.db, ownerId, targetId)) return false;

  appendAdminLog(ctx.db, { action: "blacklist_remove", actorId: ownerId, targetId });
  await syncActiveRoom(ctx, ownerId, targetId, "revoke");
  return true;
}
