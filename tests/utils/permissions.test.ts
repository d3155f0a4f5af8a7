/**
 * Titlekeeper — tests/utils/permissions.test.ts
 * WHAT: Who counts as privileged, and which name a requester is matched by.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect } from "vitest";
import { isPrivileged, requesterIdentity } from "../../src/utils/permissions.js";
import { createMockInteraction, createMockUser } from "./discordMocks.js";

describe("permissions", () => {
  describe("isPrivileged", () => {
    it("grants administrators", () => {
      expect(isPrivileged(createMockInteraction({ isAdmin: true }))).toBe(true);
    });

    it("refuses ordinary members", () => {
      expect(isPrivileged(createMockInteraction())).toBe(false);
    });

    it("grants the guild owner without the Administrator bit", () => {
      const interaction = createMockInteraction({ user: createMockUser({ id: "owner-123" }) });
      expect(isPrivileged(interaction)).toBe(true);
    });

    it("refuses outside a guild", () => {
      expect(isPrivileged(createMockInteraction({ isAdmin: true, guildId: null }))).toBe(false);
    });
  });

  describe("requesterIdentity", () => {
    it("uses the member display name", () => {
      expect(requesterIdentity(createMockInteraction({ displayName: "Alice" }))).toBe("Alice");
    });

    it("falls back to the global name without a member", () => {
      const interaction = createMockInteraction({
        member: null,
        user: createMockUser({ globalName: "Ally" }),
      });
      expect(requesterIdentity(interaction)).toBe("Ally");
    });

    it("falls back to the username last", () => {
      expect(requesterIdentity(createMockInteraction({ member: null }))).toBe("testuser");
    });
  });
});
