import { ButtonStyle, OverwriteType, PermissionFlagsBits } from "discord.js";
import { expect, test } from "vitest";
import { toOverwrites } from "../platform/discordPlatform.js";
import {
  buildAdminLogsEmbed,
  buildDetailsModal,
  buildLobbyMessage,
  buildRoomListEmbed,
  DETAILS_TEMPLATE,
  normalizeDetails,
  parseComponentId,
} from "../ui/lobby.js";
import { TEST_SETTINGS } from "./helpers/context.js";

const GUILD = "900000000000000001";
const USER = "100000000000000001";

test("component ids round-trip through the parser", () => {
  expect(parseComponentId("room:create:a_only")).toEqual({ kind: "create", category: "a_only" });
  expect(parseComponentId("room:details:either")).toEqual({ kind: "details", category: "either" });
  expect(parseComponentId("room:list")).toEqual({ kind: "list" });
});

test("unknown component ids are not ours", () => {
  expect(parseComponentId("room:create:everyone")).toBeNull();
  expect(parseComponentId("room:create:a_only:extra")).toBeNull();
  expect(parseComponentId("other:create:a_only")).toBeNull();
  expect(parseComponentId("room:join:either")).toBeNull();
});

test("the lobby offers one button per category with the group labels", () => {
  const message = buildLobbyMessage(TEST_SETTINGS);
  const [row] = message.components;
  const buttons = row?.toJSON().components ?? [];

  expect(buttons).toMatchObject([
    { custom_id: "room:create:a_only", label: "Listeners only", style: ButtonStyle.Primary },
    { custom_id: "room:create:b_only", label: "Talkers only", style: ButtonStyle.Danger },
    { custom_id: "room:create:either", label: "Either is fine", style: ButtonStyle.Secondary },
  ]);
});

test("the details modal carries the category and a bounded, prefilled field", () => {
  const modal = buildDetailsModal("b_only").toJSON();

  expect(modal).toMatchObject({
    custom_id: "room:details:b_only",
    components: [
      {
        components: [{ custom_id: "details", max_length: 200, required: false, value: DETAILS_TEMPLATE }],
      },
    ],
  });
});

test("an untouched template counts as no details", () => {
  expect(normalizeDetails(`  ${DETAILS_TEMPLATE}\n`)).toBe("");
  expect(normalizeDetails(" evenings only ")).toBe("evenings only");
});

test("room list fields link the creator and the text channel", () => {
  const embed = buildRoomListEmbed([
    { creatorId: USER, groupLabel: "Listeners", details: "", textChannelId: "300000000000000001" },
  ]).toJSON();

  expect(embed.description).toBe("Rooms you can join right now.");
  expect(embed.fields).toEqual([
    {
      name: "Listeners",
      value: `Creator: <@${USER}>\nDetails: (none)\nChannel: <#300000000000000001>`,
      inline: false,
    },
  ]);
});

test("room lists are capped at the embed field limit", () => {
  const items = Array.from({ length: 30 }, (_, i) => ({
    creatorId: USER,
    groupLabel: `room ${i}`,
    details: "",
    textChannelId: "300000000000000001",
  }));

  const embed = buildRoomListEmbed(items).toJSON();

  expect(embed.fields).toHaveLength(25);
  expect(embed.description).toBe("Showing 25 of 30 rooms.");
});

test("system actions show as system in the admin log view", () => {
  const embed = buildAdminLogsEmbed([
    {
      log_id: 1,
      action: "room_auto_delete",
      actor_id: null,
      target_id: USER,
      details: "channel=400000000000000001",
      created_at_ms: 0,
    },
  ]).toJSON();

  expect(embed.fields?.[0]?.name).toMatch(/^1\. room_auto_delete \(/);
  expect(embed.fields?.[0]?.value).toBe(`Actor: system\nTarget: <@${USER}>\nDetails: channel=400000000000000001`);
});

test("rules map to role and member overwrites", () => {
  expect(
    toOverwrites(GUILD, [
      { principal: { kind: "everyone" }, decision: "deny", source: "base" },
      { principal: { kind: "member", id: "100000000000000999" }, decision: "allow", source: "service" },
      { principal: { kind: "role", id: "600000000000000001" }, decision: "allow", source: "category" },
    ])
  ).toEqual([
    { id: GUILD, type: OverwriteType.Role, deny: [PermissionFlagsBits.ViewChannel, PermissionFlagsBits.Connect] },
    {
      id: "100000000000000999",
      type: OverwriteType.Member,
      allow: [PermissionFlagsBits.ViewChannel, PermissionFlagsBits.Connect, PermissionFlagsBits.SendMessages],
    },
    {
      id: "600000000000000001",
      type: OverwriteType.Role,
      allow: [PermissionFlagsBits.ViewChannel, PermissionFlagsBits.Connect],
    },
  ]);
});
