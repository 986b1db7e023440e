export const VISIBILITY_CATEGORIES = ["a_only", "b_only", "either"] as const;

/** Which eligibility group(s) may see a room while it is open. */
export type VisibilityCategory = (typeof VISIBILITY_CATEGORIES)[number];

/** Eligibility group a member belongs to, derived from their guild roles. */
export type ViewerGroup = "a" | "b";

export const ROOM_DETAILS_MAX_CHARS = 200;

export type Room = {
  room_id: number;
  text_channel_id: string;
  voice_channel_id: string;
  creator_id: string;
  created_at_ms: number;
  hidden_role_id: string;
  visibility_category: VisibilityCategory;
  details: string;
};

export function isVisibilityCategory(value: string): value is VisibilityCategory {
  return VISIBILITY_CATEGORIES.some((c) => c === value);
}
