import { SlashCommandBuilder } from "discord.js";
import { describeError } from "../errors.js";
import { onRoomDeleteRequested } from "../rooms/teardown.js";
import { log } from "../utils/logger.js";
import type { Command } from "./index.js";

const roomLog = log.withScope("rooms");

export const deleteRoom: Command = {
  data: new SlashCommandBuilder()
    .setName("delete-room")
    .setDescription("Delete the room this channel belongs to (creator or admin)."),

  async execute(interaction, ctx) {
    await interaction.deferReply({ ephemeral: true });
    const result = await onRoomDeleteRequested(ctx.guild, {
      channelId: interaction.channelId,
      requesterId: interaction.user.id,
      requesterIsAdmin: ctx.isAdmin,
    });

    // usually issued inside the room, so the channel may already be gone
    await interaction
      .editReply({ content: result.failures.length ? "Room deleted, with some leftovers (see logs)." : "✅ Room deleted." })
      .catch((err) => roomLog.debug(`Delete confirmation not delivered: ${describeError(err)}`));
  },
};
