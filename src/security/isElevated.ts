import { GuildMember, PermissionFlagsBits } from "discord.js";
import { cfg } from "../config/env.js";

/**
 * Administrators: the guild owner, anyone with the Administrator permission,
 * and holders of ADMIN_ROLE_ID when it is set.
 */
export function isElevated(member: GuildMember | null, adminRoleId = cfg.discord.adminRoleId): boolean {
  if (!member) return false;

  if (member.guild.ownerId === member.id) return true;

  if (member.permissions.has(PermissionFlagsBits.Administrator)) return true;

  if (adminRoleId && member.roles.cache.has(adminRoleId)) return true;

  return false;
}
