import type Database from "better-sqlite3";
import { createAppContext, withPlatform, type GuildContext, type RoomSettings } from "../../context.js";
import { FakePlatform } from "../fakes/fakePlatform.js";

export const TEST_SETTINGS: RoomSettings = {
  groupARoleName: "Group A",
  groupBRoleName: "Group B",
  groupALabel: "Listeners",
  groupBLabel: "Talkers",
};

export type FakeGuild = {
  ctx: GuildContext;
  platform: FakePlatform;
  roleA: string;
  roleB: string;
};

/** A guild with both group roles present. */
export function makeFakeGuild(db: Database.Database, settings: RoomSettings = TEST_SETTINGS): FakeGuild {
  const platform = new FakePlatform();
  const roleA = platform.addRole(settings.groupARoleName);
  const roleB = platform.addRole(settings.groupBRoleName);
  return { ctx: withPlatform(createAppContext(db, settings), platform), platform, roleA, roleB };
}
