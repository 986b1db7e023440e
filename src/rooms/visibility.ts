/**
 * Visibility planning for a room.
 *
 * The desired permission state is a pure function of the room's category,
 * creator, hidden role, live occupancy and the creator's blocked guild members.
 * It is expressed as an ordered rule list; flattening keeps the last decision
 * per principal, so the order below is the precedence:
 *
 *   open  (humans < 2): everyone deny, service allow, category rules,
 *                       hidden role deny, creator allow, blacklist deny
 *   full  (humans >= 2): everyone deny, service allow, creator allow,
 *                       occupant allow, hidden role deny, blacklist deny
 *
 * The blacklist pass is always last, so a blocked user ends up denied even if
 * they are somehow present in the voice channel.
 */

import type { Occupant, OverwriteRule, Principal } from "../platform/types.js";
import type { VisibilityCategory } from "./types.js";

export const FULL_ROOM_HUMAN_COUNT = 2;
/** Largest user limit a voice channel accepts. */
export const MAX_USER_LIMIT = 99;

export type RoomVisibility = "open" | "full";

export interface GroupRoleIds {
  a: string | null;
  b: string | null;
}

export interface VisibilityInput {
  category: VisibilityCategory;
  creatorId: string;
  hiddenRoleId: string | null;
  serviceUserId: string;
  occupants: readonly Occupant[];
  groupRoleIds: GroupRoleIds;
  /** Creator's blocked users who are currently guild members. */
  blockedMemberIds: readonly string[];
}

export interface VisibilityPlan {
  visibility: RoomVisibility;
  humanCount: number;
  botCount: number;
  userLimit: number;
  /** Every rule in evaluation order. */
  rules: OverwriteRule[];
  /** One rule per principal, as applied to both channels. */
  overwrites: OverwriteRule[];
}

export function principalKey(principal: Principal): string {
  return principal.kind === "everyone" ? "everyone" : `${principal.kind}:${principal.id}`;
}

/**
 * Collapse rules to one per principal. Last write wins; each principal keeps
 * the position where it first appeared.
 */
export function flattenRules(rules: readonly OverwriteRule[]): OverwriteRule[] {
  const byPrincipal = new Map<string, OverwriteRule>();
  for (const rule of rules) {
    byPrincipal.set(principalKey(rule.principal), rule);
  }
  return [...byPrincipal.values()];
}

function categoryRules(category: VisibilityCategory, roles: GroupRoleIds): OverwriteRule[] {
  const decisions: Array<[string | null, "allow" | "deny"]> =
    category === "a_only"
      ? [
          [roles.a, "allow"],
          [roles.b, "deny"],
        ]
      : category === "b_only"
        ? [
            [roles.b, "allow"],
            [roles.a, "deny"],
          ]
        : [
            [roles.a, "allow"],
            [roles.b, "allow"],
          ];

  const rules: OverwriteRule[] = [];
  for (const [roleId, decision] of decisions) {
    if (!roleId) continue;
    rules.push({ principal: { kind: "role", id: roleId }, decision, source: "category" });
  }
  return rules;
}

export function computeVisibilityPlan(input: VisibilityInput): VisibilityPlan {
  const humanCount = input.occupants.filter((o) => !o.isBot).length;
  const botCount = input.occupants.length - humanCount;
  const visibility: RoomVisibility = humanCount >= FULL_ROOM_HUMAN_COUNT ? "full" : "open";

  const rules: OverwriteRule[] = [
    { principal: { kind: "everyone" }, decision: "deny", source: "base" },
    { principal: { kind: "member", id: input.serviceUserId }, decision: "allow", source: "service" },
  ];

  const hiddenRoleRule: OverwriteRule[] = input.hiddenRoleId
    ? [{ principal: { kind: "role", id: input.hiddenRoleId }, decision: "deny", source: "hidden_role" }]
    : [];
  const creatorRule: OverwriteRule = {
    principal: { kind: "member", id: input.creatorId },
    decision: "allow",
    source: "creator",
  };

  if (visibility === "full") {
    rules.push(creatorRule);
    for (const occupant of input.occupants) {
      // the service account already holds its wider grant
      if (occupant.userId === input.serviceUserId) continue;
      rules.push({ principal: { kind: "member", id: occupant.userId }, decision: "allow", source: "occupant" });
    }
    rules.push(...hiddenRoleRule);
  } else {
    rules.push(...categoryRules(input.category, input.groupRoleIds));
    rules.push(...hiddenRoleRule);
    rules.push(creatorRule);
  }

  for (const blockedId of input.blockedMemberIds) {
    if (blockedId === input.serviceUserId) continue;
    rules.push({ principal: { kind: "member", id: blockedId }, decision: "deny", source: "blacklist" });
  }

  return {
    visibility,
    humanCount,
    botCount,
    userLimit: Math.min(humanCount + botCount + 1, MAX_USER_LIMIT),
    rules,
    overwrites: flattenRules(rules),
  };
}
