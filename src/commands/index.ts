import {
  Collection,
  Events,
  type ButtonInteraction,
  type ChatInputCommandInteraction,
  type Client,
  type Interaction,
  type ModalSubmitInteraction,
  type RESTPostAPIChatInputApplicationCommandsJSONBody,
} from "discord.js";
import { appendAdminLog } from "../audit/adminLog.js";
import { withPlatform, type AppContext, type GuildContext } from "../context.js";
import { describeError, DuplicateActiveRoomError, NotAuthorizedError, toUserMessage } from "../errors.js";
import { DiscordGuildPlatform, fetchMemberOrNull, memberGroups } from "../platform/discordPlatform.js";
import { creatorGroupLabel, onRoomCreateRequested } from "../rooms/provision.js";
import { findRoomByCreator } from "../rooms/registry.js";
import { listRoomsForViewer } from "../rooms/listing.js";
import { isElevated } from "../security/isElevated.js";
import {
  buildDetailsModal,
  buildRoomListEmbed,
  DETAILS_FIELD_ID,
  normalizeDetails,
  parseComponentId,
  type RoomListItem,
} from "../ui/lobby.js";
import { log } from "../utils/logger.js";
import { adminLogs, clearRooms, purgeLogs, setupBlacklistHelp, setupLobby, setupRoomListButton } from "./admin.js";
import { blAdd, blList, blRemove } from "./blacklist.js";
import { deleteRoom } from "./rooms.js";

const commandsLog = log.withScope("commands");

export type CommandCtx = {
  guild: GuildContext;
  isAdmin: boolean;
};

export type GuildCommandInteraction = ChatInputCommandInteraction<"cached">;

export interface Command {
  data: { name: string; toJSON(): RESTPostAPIChatInputApplicationCommandsJSONBody };
  adminOnly?: boolean;
  execute(interaction: GuildCommandInteraction, ctx: CommandCtx): Promise<void>;
}

export const commandList: Command[] = [
  blAdd,
  blRemove,
  blList,
  deleteRoom,
  setupLobby,
  setupRoomListButton,
  setupBlacklistHelp,
  adminLogs,
  clearRooms,
  purgeLogs,
];

export const commandMap = new Collection(commandList.map((c) => [c.data.name, c]));

type RepliableInteraction = ChatInputCommandInteraction | ButtonInteraction | ModalSubmitInteraction;

/**
 * Report a failure to the user exactly once, whatever state the interaction is in.
 */
async function replyWithError(interaction: RepliableInteraction, err: unknown): Promise<void> {
  const content = toUserMessage(err);
  try {
    if (interaction.deferred) {
      await interaction.editReply({ content });
    } else if (interaction.replied) {
      await interaction.followUp({ content, ephemeral: true });
    } else {
      await interaction.reply({ content, ephemeral: true });
    }
  } catch (replyErr) {
    commandsLog.warn(`Could not report error to ${interaction.user.id}: ${describeError(replyErr)}`);
  }
}

async function handleCommand(interaction: GuildCommandInteraction, app: AppContext): Promise<void> {
  const cmd = commandMap.get(interaction.commandName);
  if (!cmd) return;

  appendAdminLog(app.db, {
    action: "command_run",
    actorId: interaction.user.id,
    details: `/${interaction.commandName}`,
  });

  const isAdmin = isElevated(interaction.member);
  if (cmd.adminOnly && !isAdmin) {
    throw new NotAuthorizedError(
      interaction.user.id,
      `run /${interaction.commandName}`,
      "This command is for administrators only."
    );
  }

  await cmd.execute(interaction, { guild: withPlatform(app, new DiscordGuildPlatform(interaction.guild)), isAdmin });
}

async function showRoomList(interaction: ButtonInteraction<"cached">, app: AppContext): Promise<void> {
  const rooms = listRoomsForViewer(app.db, {
    viewerId: interaction.user.id,
    viewerGroups: memberGroups(interaction.member, app.settings),
  });
  if (rooms.length === 0) {
    await interaction.reply({ content: "There are no open rooms right now.", ephemeral: true });
    return;
  }

  await interaction.deferReply({ ephemeral: true });
  const items: RoomListItem[] = [];
  for (const room of rooms) {
    const creator = await fetchMemberOrNull(interaction.guild, room.creator_id);
    items.push({
      creatorId: room.creator_id,
      groupLabel: creatorGroupLabel(creator ? memberGroups(creator, app.settings) : [], app.settings),
      details: room.details,
      textChannelId: room.text_channel_id,
    });
  }
  await interaction.editReply({ embeds: [buildRoomListEmbed(items)] });
}

async function handleButton(interaction: ButtonInteraction<"cached">, app: AppContext): Promise<void> {
  const action = parseComponentId(interaction.customId);
  if (!action) return;

  appendAdminLog(app.db, { action: "button_click", actorId: interaction.user.id, details: interaction.customId });

  if (action.kind === "list") {
    await showRoomList(interaction, app);
    return;
  }
  if (action.kind === "create") {
    if (findRoomByCreator(app.db, interaction.user.id)) {
      throw new DuplicateActiveRoomError(interaction.user.id);
    }
    await interaction.showModal(buildDetailsModal(action.category));
  }
}

async function handleModal(interaction: ModalSubmitInteraction<"cached">, app: AppContext): Promise<void> {
  const action = parseComponentId(interaction.customId);
  if (action?.kind !== "details") return;

  await interaction.deferReply({ ephemeral: true });
  const ctx = withPlatform(app, new DiscordGuildPlatform(interaction.guild));
  const { room } = await onRoomCreateRequested(
    ctx,
    {
      creatorId: interaction.user.id,
      creatorDisplayName: interaction.member.displayName,
      category: action.category,
      details: normalizeDetails(interaction.fields.getTextInputValue(DETAILS_FIELD_ID)),
    },
    memberGroups(interaction.member, app.settings)
  );
  await interaction.editReply({ content: `✅ Your room is ready: <#${room.text_channel_id}>` });
}

async function routeInteraction(interaction: Interaction, app: AppContext): Promise<void> {
  if (!interaction.isChatInputCommand() && !interaction.isButton() && !interaction.isModalSubmit()) return;

  if (!interaction.inCachedGuild()) {
    await interaction.reply({ content: "This only works inside a server.", ephemeral: true });
    return;
  }

  try {
    if (interaction.isChatInputCommand()) {
      await handleCommand(interaction, app);
    } else if (interaction.isButton()) {
      await handleButton(interaction, app);
    } else if (interaction.isModalSubmit()) {
      await handleModal(interaction, app);
    }
  } catch (err) {
    const label = interaction.isChatInputCommand() ? `/${interaction.commandName}` : interaction.customId;
    commandsLog.error(`Interaction ${label} failed: ${describeError(err)}`);
    await replyWithError(interaction, err);
  }
}

export function registerHandlers(client: Client, app: AppContext): void {
  client.on(Events.InteractionCreate, (interaction) => {
    routeInteraction(interaction, app).catch((err) =>
      commandsLog.error(`Unhandled interaction failure: ${describeError(err)}`)
    );
  });
}
