/**
 * Request records accepted by the core entry points.
 *
 * The interaction and gateway layers build these from platform payloads; each
 * entry point parses its record before touching the store or the platform.
 */

import { z } from "zod";
import { InvalidRequestError } from "./errors.js";
import { ROOM_DETAILS_MAX_CHARS, VISIBILITY_CATEGORIES } from "./rooms/types.js";

export const DEFAULT_BLOCK_REASON = "No reason given";

const snowflake = z.string().regex(/^\d{17,20}$/, "expected a snowflake id");

export const roomCreateRequestSchema = z.object({
  creatorId: snowflake,
  creatorDisplayName: z.string().trim().min(1).max(64),
  category: z.enum(VISIBILITY_CATEGORIES),
  details: z.string().max(ROOM_DETAILS_MAX_CHARS).default(""),
});

export const roomDeleteRequestSchema = z.object({
  channelId: snowflake,
  requesterId: snowflake,
  requesterIsAdmin: z.boolean(),
});

export const roomChannelDeletedSchema = z.object({
  channelId: snowflake,
  side: z.enum(["text", "voice"]),
  parentId: snowflake.nullable(),
});

export const occupancyChangedSchema = z.object({
  channelId: snowflake,
});

export const blockRequestSchema = z.object({
  ownerId: snowflake,
  targetId: snowflake,
  reason: z.string().trim().max(200).default(DEFAULT_BLOCK_REASON),
});

export const unblockRequestSchema = z.object({
  ownerId: snowflake,
  targetId: snowflake,
});

export type RoomCreateRequest = z.input<typeof roomCreateRequestSchema>;
export type RoomDeleteRequest = z.input<typeof roomDeleteRequestSchema>;
export type RoomChannelDeleted = z.input<typeof roomChannelDeletedSchema>;
export type OccupancyChanged = z.input<typeof occupancyChangedSchema>;
export type BlockRequest = z.input<typeof blockRequestSchema>;
export type UnblockRequest = z.input<typeof unblockRequestSchema>;

export function parseRequest<S extends z.ZodTypeAny>(schema: S, raw: unknown, name: string): z.output<S> {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new InvalidRequestError(`Invalid ${name}: ${issues}`);
  }
  return parsed.data;
}
