/**
 * Reconciliation: recompute and apply a room's permission overwrites and user limit.
 *
 * Best-effort by policy. Nothing here throws to the caller; failures are logged
 * and reported in the outcome, and the next occupancy event recomputes
 * everything from scratch. Every pass is a full recomputation, so repeated or
 * reordered invocations converge once the last one sees the true occupancy.
 */

import type { GuildContext } from "../context.js";
import { listBlocked } from "../blacklist/blacklist.js";
import { describeError } from "../errors.js";
import { occupancyChangedSchema, parseRequest, type OccupancyChanged } from "../requests.js";
import { log } from "../utils/logger.js";
import { findRoomByChannel } from "./registry.js";
import type { Room } from "./types.js";
import { computeVisibilityPlan, type GroupRoleIds, type VisibilityPlan } from "./visibility.js";

const reconcileLog = log.withScope("reconcile");

export type ReconcileOutcome =
  | { success: true; roomId: number; plan: VisibilityPlan }
  | { success: false; reason: "not_a_room" | "channel_missing" }
  | { success: false; reason: "lookup_failed"; error: string }
  | { success: false; reason: "apply_failed"; roomId: number; plan: VisibilityPlan; failures: string[] };

export async function resolveGroupRoleIds(ctx: GuildContext): Promise<GroupRoleIds> {
  const [a, b] = await Promise.all([
    ctx.platform.findRoleIdByName(ctx.settings.groupARoleName),
    ctx.platform.findRoleIdByName(ctx.settings.groupBRoleName),
  ]);
  return { a, b };
}

async function applyPlan(ctx: GuildContext, room: Room, plan: VisibilityPlan): Promise<string[]> {
  const failures: string[] = [];

  for (const channelId of [room.text_channel_id, room.voice_channel_id]) {
    try {
      await ctx.platform.setPermissionOverwrites(channelId, plan.overwrites);
    } catch (err) {
      failures.push(`overwrites ${channelId}: ${describeError(err)}`);
    }
  }

  try {
    await ctx.platform.setUserLimit(room.voice_channel_id, plan.userLimit);
  } catch (err) {
    failures.push(`user limit ${room.voice_channel_id}: ${describeError(err)}`);
  }

  return failures;
}

/**
 * Recompute and apply the desired state for one room.
 */
export async function reconcileRoom(ctx: GuildContext, room: Room): Promise<ReconcileOutcome> {
  let plan: VisibilityPlan;
  try {
    const occupants = await ctx.platform.getVoiceOccupants(room.voice_channel_id);
    if (!occupants) {
      reconcileLog.debug(`Voice channel ${room.voice_channel_id} is gone; skipping room ${room.room_id}`);
      return { success: false, reason: "channel_missing" };
    }

    const groupRoleIds = await resolveGroupRoleIds(ctx);
    const blockedMemberIds = await ctx.platform.filterGuildMembers(listBlocked(ctx.db, room.creator_id));

    plan = computeVisibilityPlan({
      category: room.visibility_category,
      creatorId: room.creator_id,
      hiddenRoleId: room.hidden_role_id,
      serviceUserId: ctx.platform.serviceUserId,
      occupants,
      groupRoleIds,
      blockedMemberIds,
    });
  } catch (err) {
    const error = describeError(err);
    reconcileLog.error(`Failed to gather state for room ${room.room_id}: ${error}`);
    return { success: false, reason: "lookup_failed", error };
  }

  const failures = await applyPlan(ctx, room, plan);
  if (failures.length > 0) {
    reconcileLog.error(`Room ${room.room_id} partially reconciled`, { failures });
    return { success: false, reason: "apply_failed", roomId: room.room_id, plan, failures };
  }

  reconcileLog.info(
    `Room ${room.room_id} is ${plan.visibility} (humans=${plan.humanCount}, bots=${plan.botCount}, limit=${plan.userLimit})`
  );
  return { success: true, roomId: room.room_id, plan };
}

/**
 * Entry point for a member joining or leaving a voice channel.
 * Callers invoke it for both the origin and the destination channel.
 */
export async function onOccupancyChanged(ctx: GuildContext, request: OccupancyChanged): Promise<ReconcileOutcome> {
  let room: Room | null;
  try {
    const { channelId } = parseRequest(occupancyChangedSchema, request, "occupancy change");
    room = findRoomByChannel(ctx.db, channelId);
  } catch (err) {
    const error = describeError(err);
    reconcileLog.error(`Room lookup failed for channel ${request.channelId}: ${error}`);
    return { success: false, reason: "lookup_failed", error };
  }

  if (!room || room.voice_channel_id !== request.channelId) {
    return { success: false, reason: "not_a_room" };
  }

  return reconcileRoom(ctx, room);
}
