import type Database from "better-sqlite3";
import type { Config } from "./config/types.js";
import type { ChatPlatform } from "./platform/types.js";

export type RoomSettings = Config["rooms"];

/** Built once at startup and threaded through every component. */
export interface AppContext {
  db: Database.Database;
  settings: RoomSettings;
  /** Creators whose room is being provisioned right now. */
  inFlightCreators: Set<string>;
}

/** AppContext plus the platform adapter of the guild an event came from. */
export interface GuildContext extends AppContext {
  platform: ChatPlatform;
}

export function createAppContext(db: Database.Database, settings: RoomSettings): AppContext {
  return { db, settings, inFlightCreators: new Set() };
}

export function withPlatform(app: AppContext, platform: ChatPlatform): GuildContext {
  return { ...app, platform };
}
