/**
 * Message components and embeds: lobby buttons, details modal, room list,
 * blacklist and admin log views.
 *
 * Custom ids:
 *   room:create:<category>   lobby button, opens the details modal
 *   room:details:<category>  details modal submit
 *   room:list                room-list button
 */

import {
  ActionRowBuilder,
  ButtonBuilder,
  ButtonStyle,
  Colors,
  EmbedBuilder,
  ModalBuilder,
  TextInputBuilder,
  TextInputStyle,
} from "discord.js";
import { DateTime } from "luxon";
import type { AdminLogEntry } from "../audit/adminLog.js";
import type { BlacklistEntry } from "../blacklist/blacklist.js";
import type { RoomSettings } from "../context.js";
import { isVisibilityCategory, ROOM_DETAILS_MAX_CHARS, type VisibilityCategory } from "../rooms/types.js";

export const DETAILS_FIELD_ID = "details";
export const ROOM_LIST_BUTTON_ID = "room:list";
export const DETAILS_TEMPLATE = "[From]\n[Until]\n[Looking for]\n[No-gos]\n[A word]";

/** Discord rejects embeds with more fields than this. */
const MAX_EMBED_FIELDS = 25;

export type ComponentAction =
  | { kind: "create"; category: VisibilityCategory }
  | { kind: "details"; category: VisibilityCategory }
  | { kind: "list" };

export function createButtonId(category: VisibilityCategory): string {
  return `room:create:${category}`;
}

export function detailsModalId(category: VisibilityCategory): string {
  return `room:details:${category}`;
}

export function parseComponentId(customId: string): ComponentAction | null {
  if (customId === ROOM_LIST_BUTTON_ID) return { kind: "list" };

  const [prefix, action, category, ...rest] = customId.split(":");
  if (prefix !== "room" || rest.length > 0 || category === undefined || !isVisibilityCategory(category)) {
    return null;
  }
  if (action === "create") return { kind: "create", category };
  if (action === "details") return { kind: "details", category };
  return null;
}

export function categoryLabel(category: VisibilityCategory, settings: RoomSettings): string {
  switch (category) {
    case "a_only":
      return `${settings.groupALabel} only`;
    case "b_only":
      return `${settings.groupBLabel} only`;
    case "either":
      return "Either is fine";
  }
}

export function buildLobbyMessage(settings: RoomSettings) {
  const buttons = [
    new ButtonBuilder()
      .setCustomId(createButtonId("a_only"))
      .setLabel(categoryLabel("a_only", settings))
      .setStyle(ButtonStyle.Primary),
    new ButtonBuilder()
      .setCustomId(createButtonId("b_only"))
      .setLabel(categoryLabel("b_only", settings))
      .setStyle(ButtonStyle.Danger),
    new ButtonBuilder()
      .setCustomId(createButtonId("either"))
      .setLabel(categoryLabel("either", settings))
      .setStyle(ButtonStyle.Secondary),
  ];

  return {
    content:
      "**Start a room**\n" +
      "Pick who should be able to see your room. Pressing a button opens a short form, then your room is created.",
    components: [new ActionRowBuilder<ButtonBuilder>().addComponents(buttons)],
  };
}

export function buildRoomListButtonMessage() {
  const button = new ButtonBuilder()
    .setCustomId(ROOM_LIST_BUTTON_ID)
    .setLabel("Browse rooms")
    .setStyle(ButtonStyle.Primary);

  return {
    content: "Press the button to see the rooms that are open to you.",
    components: [new ActionRowBuilder<ButtonBuilder>().addComponents(button)],
  };
}

export function buildDetailsModal(category: VisibilityCategory): ModalBuilder {
  const input = new TextInputBuilder()
    .setCustomId(DETAILS_FIELD_ID)
    .setLabel(`Details (optional, up to ${ROOM_DETAILS_MAX_CHARS} characters)`)
    .setStyle(TextInputStyle.Paragraph)
    .setRequired(false)
    .setMaxLength(ROOM_DETAILS_MAX_CHARS)
    .setValue(DETAILS_TEMPLATE)
    .setPlaceholder("Tell others what you are looking for");

  return new ModalBuilder()
    .setCustomId(detailsModalId(category))
    .setTitle("Room details")
    .addComponents(new ActionRowBuilder<TextInputBuilder>().addComponents(input));
}

/** The untouched template counts as no details. */
export function normalizeDetails(raw: string): string {
  const trimmed = raw.trim();
  return trimmed === DETAILS_TEMPLATE ? "" : trimmed;
}

export type RoomListItem = {
  creatorId: string;
  groupLabel: string;
  details: string;
  textChannelId: string;
};

export function buildRoomListEmbed(items: readonly RoomListItem[]): EmbedBuilder {
  const shown = items.slice(0, MAX_EMBED_FIELDS);
  const embed = new EmbedBuilder()
    .setTitle("Open rooms")
    .setColor(Colors.Green)
    .setDescription(
      shown.length < items.length ? `Showing ${shown.length} of ${items.length} rooms.` : "Rooms you can join right now."
    );

  for (const item of shown) {
    embed.addFields({
      name: item.groupLabel,
      value: `Creator: <@${item.creatorId}>\nDetails: ${item.details || "(none)"}\nChannel: <#${item.textChannelId}>`,
      inline: false,
    });
  }
  return embed;
}

export function buildBlacklistEmbed(entries: readonly BlacklistEntry[]): EmbedBuilder {
  const embed = new EmbedBuilder().setTitle("Your blacklist").setColor(Colors.Red);
  for (const entry of entries.slice(0, MAX_EMBED_FIELDS)) {
    embed.addFields({
      name: `ID: ${entry.blocked_user_id}`,
      value: `<@${entry.blocked_user_id}>\nReason: ${entry.reason}`,
      inline: false,
    });
  }
  if (entries.length > MAX_EMBED_FIELDS) {
    embed.setFooter({ text: `${entries.length - MAX_EMBED_FIELDS} more not shown` });
  }
  return embed;
}

export function buildBlacklistHelpEmbed(): EmbedBuilder {
  return new EmbedBuilder()
    .setTitle("Blacklist commands")
    .setColor(Colors.Red)
    .setDescription(
      "🚫 Your blacklist is applied when your room is created.\n" +
        "🚫 Add people before you open a room!\n\n" +
        "Use these commands to manage it:"
    )
    .addFields(
      { name: "/bl-add", value: "Block a user.\nExample: `/bl-add @user [reason]`", inline: false },
      { name: "/bl-remove", value: "Unblock a user.\nExample: `/bl-remove @user`", inline: false },
      { name: "/bl-list", value: "Show the users you have blocked (sent by DM).\nExample: `/bl-list`", inline: false }
    );
}

function formatTimestamp(ms: number): string {
  return DateTime.fromMillis(ms).toFormat("yyyy-LL-dd HH:mm:ss");
}

export function buildAdminLogsEmbed(entries: readonly AdminLogEntry[]): EmbedBuilder {
  const embed = new EmbedBuilder().setTitle("Admin log").setColor(Colors.Blue);
  entries.slice(0, MAX_EMBED_FIELDS).forEach((entry, i) => {
    embed.addFields({
      name: `${i + 1}. ${entry.action} (${formatTimestamp(entry.created_at_ms)})`,
      value: [
        `Actor: ${entry.actor_id ? `<@${entry.actor_id}>` : "system"}`,
        `Target: ${entry.target_id ? `<@${entry.target_id}>` : "none"}`,
        `Details: ${entry.details || "-"}`,
      ].join("\n"),
      inline: false,
    });
  });
  return embed;
}
