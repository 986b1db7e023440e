/**
 * Administrator commands. Hidden from non-admins by default member
 * permissions and checked again at run time (adminOnly).
 */

import { PermissionFlagsBits, SlashCommandBuilder } from "discord.js";
import { purgeLogsOlderThan, recentAdminLogs } from "../audit/adminLog.js";
import { InvalidRequestError } from "../errors.js";
import { clearAllRooms } from "../rooms/teardown.js";
import {
  buildAdminLogsEmbed,
  buildBlacklistHelpEmbed,
  buildLobbyMessage,
  buildRoomListButtonMessage,
} from "../ui/lobby.js";
import type { Command, GuildCommandInteraction } from "./index.js";

const DEFAULT_LOG_LIMIT = 10;

function adminCommand(name: string, description: string): SlashCommandBuilder {
  return new SlashCommandBuilder()
    .setName(name)
    .setDescription(description)
    .setDefaultMemberPermissions(PermissionFlagsBits.Administrator);
}

function currentChannel(interaction: GuildCommandInteraction) {
  if (!interaction.channel) {
    throw new InvalidRequestError(
      `No channel for /${interaction.commandName}`,
      "Run this command in the channel where the message should go."
    );
  }
  return interaction.channel;
}

export const setupLobby: Command = {
  data: adminCommand("setup-lobby", "Post the room creation buttons in this channel."),
  adminOnly: true,

  async execute(interaction, ctx) {
    await currentChannel(interaction).send(buildLobbyMessage(ctx.guild.settings));
    await interaction.reply({ content: "Lobby buttons posted.", ephemeral: true });
  },
};

export const setupRoomListButton: Command = {
  data: adminCommand("setup-room-list-button", "Post the room list button in this channel."),
  adminOnly: true,

  async execute(interaction) {
    await currentChannel(interaction).send(buildRoomListButtonMessage());
    await interaction.reply({ content: "Room list button posted.", ephemeral: true });
  },
};

export const setupBlacklistHelp: Command = {
  data: adminCommand("setup-blacklist-help", "Post the blacklist command guide in this channel."),
  adminOnly: true,

  async execute(interaction) {
    await currentChannel(interaction).send({ embeds: [buildBlacklistHelpEmbed()] });
    await interaction.reply({ content: "Blacklist guide posted.", ephemeral: true });
  },
};

export const adminLogs: Command = {
  data: adminCommand("admin-logs", "Show the most recent admin log entries.").addIntegerOption((opt) =>
    opt.setName("limit").setDescription("How many entries").setMinValue(1).setMaxValue(25).setRequired(false)
  ),
  adminOnly: true,

  async execute(interaction, ctx) {
    const limit = interaction.options.getInteger("limit") ?? DEFAULT_LOG_LIMIT;
    const entries = recentAdminLogs(ctx.guild.db, limit);
    if (entries.length === 0) {
      await interaction.reply({ content: "The admin log is empty.", ephemeral: true });
      return;
    }
    await interaction.reply({ embeds: [buildAdminLogsEmbed(entries)], ephemeral: true });
  },
};

export const clearRooms: Command = {
  data: adminCommand("clear-rooms", "Delete every room."),
  adminOnly: true,

  async execute(interaction, ctx) {
    await interaction.deferReply({ ephemeral: true });
    const { removed, failures } = await clearAllRooms(ctx.guild, interaction.user.id);
    const suffix = failures.length ? ` ${failures.length} resource(s) could not be deleted (see logs).` : "";
    await interaction.editReply({ content: `Removed ${removed} room(s).${suffix}` });
  },
};

export const purgeLogs: Command = {
  data: adminCommand("purge-logs", "Delete admin log entries older than the given number of days.").addIntegerOption(
    (opt) => opt.setName("days").setDescription("Age in days").setMinValue(0).setRequired(true)
  ),
  adminOnly: true,

  async execute(interaction, ctx) {
    const days = interaction.options.getInteger("days", true);
    const removed = purgeLogsOlderThan(ctx.guild, days, interaction.user.id);
    await interaction.reply({ content: `Removed ${removed} log entr${removed === 1 ? "y" : "ies"}.`, ephemeral: true });
  },
};
