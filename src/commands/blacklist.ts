/**
 * /bl-add, /bl-remove, /bl-list: each member's personal blacklist.
 */

import { SlashCommandBuilder } from "discord.js";
import { listBlacklistEntries } from "../blacklist/blacklist.js";
import { onBlockRequested, onUnblockRequested } from "../blacklist/requests.js";
import { describeError } from "../errors.js";
import { buildBlacklistEmbed } from "../ui/lobby.js";
import { log } from "../utils/logger.js";
import type { Command } from "./index.js";

const blacklistLog = log.withScope("blacklist");

export const blAdd: Command = {
  data: new SlashCommandBuilder()
    .setName("bl-add")
    .setDescription("Add a user to your blacklist.")
    .addUserOption((opt) => opt.setName("user").setDescription("User to block").setRequired(true))
    .addStringOption((opt) =>
      opt.setName("reason").setDescription("Why (only you and admins see this)").setMaxLength(200).setRequired(false)
    ),

  async execute(interaction, ctx) {
    const target = interaction.options.getMember("user");
    if (!target) {
      await interaction.reply({ content: "That user is not a member of this server.", ephemeral: true });
      return;
    }
    const reason = interaction.options.getString("reason") ?? undefined;

    await interaction.deferReply({ ephemeral: true });
    await onBlockRequested(ctx.guild, { ownerId: interaction.user.id, targetId: target.id, reason });
    await interaction.editReply({ content: `✅ <@${target.id}> was added to your blacklist.` });
  },
};

export const blRemove: Command = {
  data: new SlashCommandBuilder()
    .setName("bl-remove")
    .setDescription("Remove a user from your blacklist.")
    .addUserOption((opt) => opt.setName("user").setDescription("User to unblock").setRequired(true)),

  async execute(interaction, ctx) {
    const target = interaction.options.getUser("user", true);

    await interaction.deferReply({ ephemeral: true });
    const removed = await onUnblockRequested(ctx.guild, { ownerId: interaction.user.id, targetId: target.id });
    await interaction.editReply({
      content: removed
        ? `✅ <@${target.id}> was removed from your blacklist.`
        : `<@${target.id}> is not on your blacklist.`,
    });
  },
};

export const blList: Command = {
  data: new SlashCommandBuilder().setName("bl-list").setDescription("Show your blacklist (sent by DM)."),

  async execute(interaction, ctx) {
    const entries = listBlacklistEntries(ctx.guild.db, interaction.user.id);
    if (entries.length === 0) {
      await interaction.reply({ content: "Your blacklist is empty.", ephemeral: true });
      return;
    }

    const embed = buildBlacklistEmbed(entries);
    try {
      await interaction.user.send({ embeds: [embed] });
    } catch (err) {
      blacklistLog.warn(`DM to ${interaction.user.id} failed: ${describeError(err)}`);
      await interaction.reply({
        content: "I could not DM you. Check that DMs from server members are allowed. Here it is instead:",
        embeds: [embed],
        ephemeral: true,
      });
      return;
    }
    await interaction.reply({ content: "✅ Sent your blacklist by DM.", ephemeral: true });
  },
};
