/**
 * Contract the room core needs from the chat platform, scoped to one guild.
 *
 * Every method is a fallible remote call. Implementations report failures as
 * ExternalApiFailureError so callers can roll back or log uniformly.
 */

export type Principal =
  | { kind: "everyone" }
  | { kind: "role"; id: string }
  | { kind: "member"; id: string };

export type Decision = "allow" | "deny";

export type RuleSource =
  | "base"
  | "service"
  | "category"
  | "creator"
  | "occupant"
  | "hidden_role"
  | "blacklist";

export interface OverwriteRule {
  principal: Principal;
  decision: Decision;
  source: RuleSource;
}

export interface Occupant {
  userId: string;
  isBot: boolean;
}

export type RoomChannelKind = "text" | "voice";

export interface CreateChannelOptions {
  kind: RoomChannelKind;
  name: string;
  parentId: string | null;
  overwrites: readonly OverwriteRule[];
}

export interface ChatPlatform {
  /** User id of the bot account itself. */
  readonly serviceUserId: string;

  findRoleIdByName(name: string): Promise<string | null>;
  /** Subset of userIds that are currently members of the guild. */
  filterGuildMembers(userIds: readonly string[]): Promise<string[]>;

  ensureCategory(name: string): Promise<string>;
  deleteCategoryIfEmpty(categoryId: string): Promise<boolean>;

  createRole(name: string): Promise<string>;
  deleteRole(roleId: string): Promise<void>;
  addMemberRole(userId: string, roleId: string): Promise<void>;
  removeMemberRole(userId: string, roleId: string): Promise<void>;

  createChannel(options: CreateChannelOptions): Promise<string>;
  /** No-op when the channel is already gone. */
  deleteChannel(channelId: string): Promise<void>;
  getParentId(channelId: string): Promise<string | null>;

  /** null when the channel no longer exists or is not a voice channel. */
  getVoiceOccupants(voiceChannelId: string): Promise<Occupant[] | null>;
  setPermissionOverwrites(channelId: string, overwrites: readonly OverwriteRule[]): Promise<void>;
  setUserLimit(voiceChannelId: string, limit: number): Promise<void>;

  sendMessage(channelId: string, content: string): Promise<void>;
}
