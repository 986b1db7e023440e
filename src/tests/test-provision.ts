import { afterEach, beforeEach, expect, test } from "vitest";
import { recentAdminLogs } from "../audit/adminLog.js";
import { blockUser } from "../blacklist/blacklist.js";
import { DuplicateActiveRoomError, ExternalApiFailureError, InvalidRequestError } from "../errors.js";
import {
  buildAnnouncement,
  creatorGroupLabel,
  hiddenRoleName,
  onRoomCreateRequested,
  roomCategoryName,
} from "../rooms/provision.js";
import { listRooms } from "../rooms/registry.js";
import { makeFakeGuild, TEST_SETTINGS, type FakeGuild } from "./helpers/context.js";
import { openTestDb, type TestDb } from "./helpers/testDb.js";

const CREATOR = "100000000000000001";
const USER_X = "200000000000000001";
const USER_GONE = "200000000000000002";

let t: TestDb;
let guild: FakeGuild;

beforeEach(() => {
  t = openTestDb("rooms-provision-");
  guild = makeFakeGuild(t.db);
});

afterEach(() => {
  t.cleanup();
});

test("creating a room provisions a category, hidden role, both channels and a record", async () => {
  const { platform, ctx } = guild;

  const { room, reconcile } = await onRoomCreateRequested(
    ctx,
    { creatorId: CREATOR, creatorDisplayName: "Alice", category: "either", details: "late night chat" },
    ["a"]
  );

  expect(reconcile.success).toBe(true);
  expect(room.creator_id).toBe(CREATOR);
  expect(room.visibility_category).toBe("either");
  expect(room.details).toBe("late night chat");

  const text = platform.channels.get(room.text_channel_id);
  const voice = platform.channels.get(room.voice_channel_id);
  expect(text?.name).toBe("Alice's room-chat");
  expect(voice?.name).toBe("Alice's room-voice");
  expect(text?.parentId).toBe(voice?.parentId);

  const category = text?.parentId ? platform.channels.get(text.parentId) : undefined;
  expect(category?.name).toBe(`Alice's rooms-${CREATOR}`);

  expect(platform.roles.get(room.hidden_role_id)).toMatch(/^[0-9a-f]{12}$/);

  const [entry] = recentAdminLogs(t.db, 1);
  expect(entry?.action).toBe("room_create");
  expect(entry?.actor_id).toBe(CREATOR);
});

test("the announcement names the creator's group and the details", async () => {
  const { platform, ctx } = guild;

  const { room } = await onRoomCreateRequested(
    ctx,
    { creatorId: CREATOR, creatorDisplayName: "Alice", category: "a_only", details: "hi" },
    ["b"]
  );

  expect(platform.channels.get(room.text_channel_id)?.messages).toEqual([
    [
      `<@${CREATOR}> (Talkers) is looking for someone to talk with!`,
      "",
      "📝 Details",
      "hi",
      "",
      "The room creator can delete this room with `/delete-room`.",
    ].join("\n"),
  ]);
});

test("a failed announcement does not undo the room", async () => {
  const { platform, ctx } = guild;
  platform.failOn.add("sendMessage");

  const { room } = await onRoomCreateRequested(ctx, { creatorId: CREATOR, creatorDisplayName: "Alice", category: "either" });

  expect(platform.channels.has(room.text_channel_id)).toBe(true);
  expect(listRooms(t.db)).toHaveLength(1);
});

test("the hidden role goes to blocked users who are still guild members", async () => {
  const { platform, ctx } = guild;
  platform.addMember(USER_X);
  blockUser(t.db, CREATOR, USER_X, "test");
  blockUser(t.db, CREATOR, USER_GONE, "test");

  const { room } = await onRoomCreateRequested(ctx, { creatorId: CREATOR, creatorDisplayName: "Alice", category: "either" });

  expect(platform.rolesOf(USER_X)).toEqual([room.hidden_role_id]);
  expect(platform.rolesOf(USER_GONE)).toEqual([]);
});

test("a second room for the same creator is rejected before any platform call", async () => {
  const { platform, ctx } = guild;
  await onRoomCreateRequested(ctx, { creatorId: CREATOR, creatorDisplayName: "Alice", category: "either" });
  const callsBefore = platform.calls.length;

  await expect(
    onRoomCreateRequested(ctx, { creatorId: CREATOR, creatorDisplayName: "Alice", category: "a_only" })
  ).rejects.toBeInstanceOf(DuplicateActiveRoomError);

  expect(platform.calls.length).toBe(callsBefore);
  expect(listRooms(t.db)).toHaveLength(1);
});

test("simultaneous requests from one creator produce exactly one room", async () => {
  const { ctx } = guild;
  const request = { creatorId: CREATOR, creatorDisplayName: "Alice", category: "either" as const };

  const results = await Promise.allSettled([
    onRoomCreateRequested(ctx, request),
    onRoomCreateRequested(ctx, request),
  ]);

  expect(results.map((r) => r.status).sort()).toEqual(["fulfilled", "rejected"]);
  expect(listRooms(t.db)).toHaveLength(1);
  expect(ctx.inFlightCreators.size).toBe(0);
});

test("a channel failure rolls back the role and the empty category", async () => {
  const { platform, ctx } = guild;
  platform.failOn.add("createChannel");

  await expect(
    onRoomCreateRequested(ctx, { creatorId: CREATOR, creatorDisplayName: "Alice", category: "either" })
  ).rejects.toBeInstanceOf(ExternalApiFailureError);

  expect([...platform.roles.keys()].sort()).toEqual([guild.roleA, guild.roleB].sort());
  expect([...platform.channels.values()]).toEqual([]);
  expect(listRooms(t.db)).toEqual([]);
  expect(ctx.inFlightCreators.size).toBe(0);
});

test("invalid requests are rejected before any platform call", async () => {
  const { platform, ctx } = guild;

  await expect(
    onRoomCreateRequested(ctx, { creatorId: CREATOR, creatorDisplayName: "   ", category: "either" })
  ).rejects.toBeInstanceOf(InvalidRequestError);
  await expect(
    onRoomCreateRequested(ctx, { creatorId: "not-a-snowflake", creatorDisplayName: "Alice", category: "either" })
  ).rejects.toBeInstanceOf(InvalidRequestError);

  expect(platform.calls).toEqual([]);
});

test("hidden role names differ for the same creator", () => {
  expect(hiddenRoleName(CREATOR)).not.toBe(hiddenRoleName(CREATOR));
});

test("naming and labels", () => {
  expect(roomCategoryName("Bob", CREATOR)).toBe(`Bob's rooms-${CREATOR}`);
  expect(creatorGroupLabel(["a", "b"], TEST_SETTINGS)).toBe("Listeners & Talkers");
  expect(creatorGroupLabel([], TEST_SETTINGS)).toBe("unspecified");
  expect(
    buildAnnouncement({ creatorId: CREATOR, groupLabel: "Listeners", details: "", noticeRoleId: "600000000000000009" })
  ).toBe(
    [
      `<@${CREATOR}> (Listeners) is looking for someone to talk with!`,
      "",
      "<@&600000000000000009>",
      "The room creator can delete this room with `/delete-room`.",
    ].join("\n")
  );
});
