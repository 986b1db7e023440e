import type Database from "better-sqlite3";
import { isBlocked } from "../blacklist/blacklist.js";
import { listRoomsByCategory } from "./registry.js";
import type { Room, ViewerGroup, VisibilityCategory } from "./types.js";

export type RoomViewer = {
  viewerId: string;
  viewerGroups: readonly ViewerGroup[];
};

export function categoriesVisibleTo(groups: readonly ViewerGroup[]): VisibilityCategory[] {
  const categories = new Set<VisibilityCategory>();
  if (groups.includes("a")) {
    categories.add("a_only");
    categories.add("either");
  }
  if (groups.includes("b")) {
    categories.add("b_only");
    categories.add("either");
  }
  return [...categories];
}

/**
 * Rooms a member may browse from the room-list button.
 * Members outside both groups see nothing; a creator who blocked the viewer is hidden.
 */
export function listRoomsForViewer(db: Database.Database, viewer: RoomViewer): Room[] {
  const categories = categoriesVisibleTo(viewer.viewerGroups);
  if (categories.length === 0) return [];
  return listRoomsByCategory(db, categories).filter((room) => !isBlocked(db, room.creator_id, viewer.viewerId));
}
