import {
  ChannelType,
  DiscordAPIError,
  OverwriteType,
  PermissionFlagsBits,
  RESTJSONErrorCodes,
  type Guild,
  type GuildBasedChannel,
  type GuildMember,
  type OverwriteResolvable,
} from "discord.js";
import type { RoomSettings } from "../context.js";
import { ExternalApiFailureError } from "../errors.js";
import type { ViewerGroup } from "../rooms/types.js";
import { log } from "../utils/logger.js";
import type { ChatPlatform, CreateChannelOptions, Occupant, OverwriteRule } from "./types.js";

const platformLog = log.withScope("platform");

const ROOM_ACCESS = [PermissionFlagsBits.ViewChannel, PermissionFlagsBits.Connect];
const SERVICE_ACCESS = [...ROOM_ACCESS, PermissionFlagsBits.SendMessages];

export function isDiscordError(err: unknown, ...codes: number[]): boolean {
  return err instanceof DiscordAPIError && codes.some((code) => code === err.code);
}

/**
 * Rules to discord.js overwrites. Allow grants view+connect (the bot also
 * gets send); deny removes view+connect.
 */
export function toOverwrites(guildId: string, rules: readonly OverwriteRule[]): OverwriteResolvable[] {
  return rules.map((rule) => {
    const { principal } = rule;
    const id = principal.kind === "everyone" ? guildId : principal.id;
    const type = principal.kind === "member" ? OverwriteType.Member : OverwriteType.Role;
    if (rule.decision === "deny") {
      return { id, type, deny: ROOM_ACCESS };
    }
    return { id, type, allow: rule.source === "service" ? SERVICE_ACCESS : ROOM_ACCESS };
  });
}

/** Groups a member belongs to, by the configured group role names. */
export function memberGroups(member: GuildMember, settings: RoomSettings): ViewerGroup[] {
  const groups: ViewerGroup[] = [];
  if (member.roles.cache.some((role) => role.name === settings.groupARoleName)) groups.push("a");
  if (member.roles.cache.some((role) => role.name === settings.groupBRoleName)) groups.push("b");
  return groups;
}

export async function fetchMemberOrNull(guild: Guild, userId: string): Promise<GuildMember | null> {
  try {
    return await guild.members.fetch(userId);
  } catch (err) {
    if (isDiscordError(err, RESTJSONErrorCodes.UnknownMember, RESTJSONErrorCodes.UnknownUser)) return null;
    throw new ExternalApiFailureError("members.fetch", err);
  }
}

export class DiscordGuildPlatform implements ChatPlatform {
  constructor(private readonly guild: Guild) {}

  get serviceUserId(): string {
    return this.guild.client.user.id;
  }

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof ExternalApiFailureError) throw err;
      platformLog.warn(`${operation} failed in guild ${this.guild.id}`, { error: String(err) });
      throw new ExternalApiFailureError(operation, err);
    }
  }

  private async fetchChannel(channelId: string): Promise<GuildBasedChannel | null> {
    try {
      return await this.guild.channels.fetch(channelId);
    } catch (err) {
      if (isDiscordError(err, RESTJSONErrorCodes.UnknownChannel)) return null;
      throw err;
    }
  }

  private async requireChannel(channelId: string): Promise<GuildBasedChannel> {
    const channel = await this.fetchChannel(channelId);
    if (!channel) throw new Error(`Channel ${channelId} not found`);
    return channel;
  }

  findRoleIdByName(name: string): Promise<string | null> {
    return this.call("roles.findByName", async () => {
      const roles = await this.guild.roles.fetch();
      return roles.find((role) => role.name === name)?.id ?? null;
    });
  }

  filterGuildMembers(userIds: readonly string[]): Promise<string[]> {
    return this.call("members.filter", async () => {
      const present: string[] = [];
      for (const userId of userIds) {
        if (await fetchMemberOrNull(this.guild, userId)) present.push(userId);
      }
      return present;
    });
  }

  ensureCategory(name: string): Promise<string> {
    return this.call("category.ensure", async () => {
      const channels = await this.guild.channels.fetch();
      const existing = channels.find((c) => c?.type === ChannelType.GuildCategory && c.name === name);
      if (existing) return existing.id;

      const created = await this.guild.channels.create({ name, type: ChannelType.GuildCategory });
      platformLog.debug(`Created category ${name} (${created.id})`);
      return created.id;
    });
  }

  deleteCategoryIfEmpty(categoryId: string): Promise<boolean> {
    return this.call("category.deleteIfEmpty", async () => {
      const category = await this.fetchChannel(categoryId);
      if (!category || category.type !== ChannelType.GuildCategory) return false;

      const channels = await this.guild.channels.fetch();
      if (channels.some((c) => c?.parentId === categoryId)) return false;

      await category.delete();
      return true;
    });
  }

  createRole(name: string): Promise<string> {
    return this.call("role.create", async () => {
      const role = await this.guild.roles.create({ name, permissions: [], hoist: false, mentionable: false });
      return role.id;
    });
  }

  deleteRole(roleId: string): Promise<void> {
    return this.call("role.delete", async () => {
      try {
        await this.guild.roles.delete(roleId);
      } catch (err) {
        if (!isDiscordError(err, RESTJSONErrorCodes.UnknownRole)) throw err;
      }
    });
  }

  addMemberRole(userId: string, roleId: string): Promise<void> {
    return this.call("member.addRole", async () => {
      await this.guild.members.addRole({ user: userId, role: roleId });
    });
  }

  removeMemberRole(userId: string, roleId: string): Promise<void> {
    return this.call("member.removeRole", async () => {
      await this.guild.members.removeRole({ user: userId, role: roleId });
    });
  }

  createChannel(options: CreateChannelOptions): Promise<string> {
    return this.call(`channel.create.${options.kind}`, async () => {
      const channel = await this.guild.channels.create({
        name: options.name,
        type: options.kind === "voice" ? ChannelType.GuildVoice : ChannelType.GuildText,
        parent: options.parentId,
        permissionOverwrites: toOverwrites(this.guild.id, options.overwrites),
      });
      return channel.id;
    });
  }

  deleteChannel(channelId: string): Promise<void> {
    return this.call("channel.delete", async () => {
      const channel = await this.fetchChannel(channelId);
      if (!channel) return;
      try {
        await channel.delete();
      } catch (err) {
        if (!isDiscordError(err, RESTJSONErrorCodes.UnknownChannel)) throw err;
      }
    });
  }

  getParentId(channelId: string): Promise<string | null> {
    return this.call("channel.parent", async () => {
      const channel = await this.fetchChannel(channelId);
      return channel?.parentId ?? null;
    });
  }

  getVoiceOccupants(voiceChannelId: string): Promise<Occupant[] | null> {
    return this.call("voice.occupants", async () => {
      const channel = await this.fetchChannel(voiceChannelId);
      if (!channel || channel.type !== ChannelType.GuildVoice) return null;
      return channel.members.map((member) => ({ userId: member.id, isBot: member.user.bot }));
    });
  }

  setPermissionOverwrites(channelId: string, overwrites: readonly OverwriteRule[]): Promise<void> {
    return this.call("channel.overwrites", async () => {
      const channel = await this.requireChannel(channelId);
      if (channel.isThread()) throw new Error(`Channel ${channelId} is a thread`);
      await channel.permissionOverwrites.set(toOverwrites(this.guild.id, overwrites));
    });
  }

  setUserLimit(voiceChannelId: string, limit: number): Promise<void> {
    return this.call("voice.userLimit", async () => {
      const channel = await this.requireChannel(voiceChannelId);
      if (channel.type !== ChannelType.GuildVoice) throw new Error(`Channel ${voiceChannelId} is not a voice channel`);
      if (channel.userLimit === limit) return;
      await channel.setUserLimit(limit);
    });
  }

  sendMessage(channelId: string, content: string): Promise<void> {
    return this.call("channel.send", async () => {
      const channel = await this.requireChannel(channelId);
      if (!channel.isTextBased()) throw new Error(`Channel ${channelId} is not text-based`);
      await channel.send({ content, allowedMentions: { parse: ["users", "roles"] } });
    });
  }
}
