import { expect, test } from "vitest";
import type { OverwriteRule } from "../platform/types.js";
import { computeVisibilityPlan, flattenRules, MAX_USER_LIMIT, type VisibilityInput } from "../rooms/visibility.js";

const CREATOR = "100000000000000001";
const SERVICE = "100000000000000999";
const HIDDEN = "500000000000000001";
const ROLE_A = "600000000000000001";
const ROLE_B = "600000000000000002";
const MEMBER_1 = "200000000000000001";
const MEMBER_2 = "200000000000000002";
const BOT = "200000000000000099";

function input(overrides: Partial<VisibilityInput> = {}): VisibilityInput {
  return {
    category: "either",
    creatorId: CREATOR,
    hiddenRoleId: HIDDEN,
    serviceUserId: SERVICE,
    occupants: [],
    groupRoleIds: { a: ROLE_A, b: ROLE_B },
    blockedMemberIds: [],
    ...overrides,
  };
}

function summary(rules: readonly OverwriteRule[]): string[] {
  return rules.map((r) => {
    const who = r.principal.kind === "everyone" ? "everyone" : `${r.principal.kind}:${r.principal.id}`;
    return `${r.decision} ${who}`;
  });
}

test("an empty room is open with the category rules and a cap of one", () => {
  const plan = computeVisibilityPlan(input());

  expect(plan.visibility).toBe("open");
  expect(plan.userLimit).toBe(1);
  expect(summary(plan.overwrites)).toEqual([
    "deny everyone",
    `allow member:${SERVICE}`,
    `allow role:${ROLE_A}`,
    `allow role:${ROLE_B}`,
    `deny role:${HIDDEN}`,
    `allow member:${CREATOR}`,
  ]);
});

test("single-group categories allow one group and deny the other", () => {
  const aOnly = computeVisibilityPlan(input({ category: "a_only" }));
  const bOnly = computeVisibilityPlan(input({ category: "b_only" }));

  expect(summary(aOnly.overwrites).slice(2, 4)).toEqual([`allow role:${ROLE_A}`, `deny role:${ROLE_B}`]);
  expect(summary(bOnly.overwrites).slice(2, 4)).toEqual([`allow role:${ROLE_B}`, `deny role:${ROLE_A}`]);
});

test("missing group roles are skipped", () => {
  const plan = computeVisibilityPlan(input({ category: "a_only", groupRoleIds: { a: null, b: ROLE_B } }));

  expect(summary(plan.overwrites)).toEqual([
    "deny everyone",
    `allow member:${SERVICE}`,
    `deny role:${ROLE_B}`,
    `deny role:${HIDDEN}`,
    `allow member:${CREATOR}`,
  ]);
});

test("two humans make the room full: only present members and the creator are allowed", () => {
  const plan = computeVisibilityPlan(
    input({
      occupants: [
        { userId: MEMBER_1, isBot: false },
        { userId: MEMBER_2, isBot: false },
      ],
    })
  );

  expect(plan.visibility).toBe("full");
  expect(plan.humanCount).toBe(2);
  expect(plan.userLimit).toBe(3);
  expect(summary(plan.overwrites)).toEqual([
    "deny everyone",
    `allow member:${SERVICE}`,
    `allow member:${CREATOR}`,
    `allow member:${MEMBER_1}`,
    `allow member:${MEMBER_2}`,
    `deny role:${HIDDEN}`,
  ]);
});

test("bots count toward the cap but not toward fullness", () => {
  const plan = computeVisibilityPlan(
    input({
      occupants: [
        { userId: MEMBER_1, isBot: false },
        { userId: BOT, isBot: true },
      ],
    })
  );

  expect(plan.visibility).toBe("open");
  expect(plan.humanCount).toBe(1);
  expect(plan.botCount).toBe(1);
  expect(plan.userLimit).toBe(3);
});

test("a blocked user who is present ends up denied", () => {
  const plan = computeVisibilityPlan(
    input({
      occupants: [
        { userId: MEMBER_1, isBot: false },
        { userId: MEMBER_2, isBot: false },
      ],
      blockedMemberIds: [MEMBER_2],
    })
  );

  const rule = plan.overwrites.find((r) => r.principal.kind === "member" && r.principal.id === MEMBER_2);
  expect(rule?.decision).toBe("deny");
  expect(rule?.source).toBe("blacklist");
});

test("the service account keeps its own grant when it sits in the channel", () => {
  const plan = computeVisibilityPlan(
    input({
      occupants: [
        { userId: MEMBER_1, isBot: false },
        { userId: MEMBER_2, isBot: false },
        { userId: SERVICE, isBot: true },
      ],
    })
  );

  const serviceRules = plan.rules.filter((r) => r.principal.kind === "member" && r.principal.id === SERVICE);
  expect(serviceRules.map((r) => r.source)).toEqual(["service"]);
  expect(plan.userLimit).toBe(4);
});

test("a stored block on the service account never overrides its grant", () => {
  const plan = computeVisibilityPlan(input({ blockedMemberIds: [SERVICE, MEMBER_1] }));

  const serviceRules = plan.rules.filter((r) => r.principal.kind === "member" && r.principal.id === SERVICE);
  expect(serviceRules.map((r) => r.source)).toEqual(["service"]);
  expect(plan.overwrites.find((r) => r.principal.kind === "member" && r.principal.id === SERVICE)?.decision).toBe(
    "allow"
  );
  expect(plan.overwrites.find((r) => r.principal.kind === "member" && r.principal.id === MEMBER_1)?.decision).toBe(
    "deny"
  );
});

test("the cap never exceeds the platform maximum", () => {
  const occupants = Array.from({ length: 120 }, (_, i) => ({
    userId: `7000000000000${String(i).padStart(5, "0")}`,
    isBot: false,
  }));

  expect(computeVisibilityPlan(input({ occupants })).userLimit).toBe(MAX_USER_LIMIT);
});

test("flattening keeps the last decision at the first position", () => {
  const rules: OverwriteRule[] = [
    { principal: { kind: "member", id: MEMBER_1 }, decision: "allow", source: "occupant" },
    { principal: { kind: "everyone" }, decision: "deny", source: "base" },
    { principal: { kind: "member", id: MEMBER_1 }, decision: "deny", source: "blacklist" },
  ];

  expect(flattenRules(rules)).toEqual([
    { principal: { kind: "member", id: MEMBER_1 }, decision: "deny", source: "blacklist" },
    { principal: { kind: "everyone" }, decision: "deny", source: "base" },
  ]);
});

test("a role and a member with the same id are different principals", () => {
  const rules: OverwriteRule[] = [
    { principal: { kind: "role", id: MEMBER_1 }, decision: "allow", source: "category" },
    { principal: { kind: "member", id: MEMBER_1 }, decision: "deny", source: "blacklist" },
  ];

  expect(flattenRules(rules)).toHaveLength(2);
});
