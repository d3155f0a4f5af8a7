/**
 * Titlekeeper — tests/commands/assign.test.ts
 * WHAT: /assign gives a vacant title to a player for a bounded time.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi, beforeEach } from "vitest";

const { mockLogger } = vi.hoisted(() => ({
  mockLogger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
}));

vi.mock("../../src/lib/logger.js", () => ({ logger: mockLogger, redact: (value: string) => value }));
vi.mock("../../src/lib/sentry.js", () => ({
  addBreadcrumb: vi.fn(),
  captureException: vi.fn(),
  setContext: vi.fn(),
  setTag: vi.fn(),
}));

import { MessageFlags } from "discord.js";
import { db } from "../../src/db/db.js";
import { execute } from "../../src/commands/assign.js";
import { assign, getStatus } from "../../src/store/titleStore.js";
import { resetTitleStore } from "../utils/dbFixtures.js";
import { createMockInteraction } from "../utils/discordMocks.js";
import { createTestCommandContext } from "../utils/contextFactory.js";

function assignInteraction(
  strings: Record<string, string | null>,
  hours: number | null = null,
  isAdmin = true
) {
  return createMockInteraction({
    options: { getString: { title: "Architect", ign: "Alice", ...strings }, getNumber: { hours } },
    isAdmin,
  });
}

describe("/assign", () => {
  beforeEach(() => {
    resetTitleStore(db);
    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(new Date("2025-01-01T00:00:00Z"));
  });

  it("is refused to non-administrators", async () => {
    const interaction = assignInteraction({}, null, false);

    await execute(createTestCommandContext(interaction));

    expect(interaction.reply).toHaveBeenCalledWith({
      content: "You don't have permission to use this command.",
      flags: MessageFlags.Ephemeral,
    });
    expect(getStatus("Architect")?.holder).toBeNull();
  });

  it("assigns for one shift by default", async () => {
    const interaction = assignInteraction({});

    await execute(createTestCommandContext(interaction));

    expect(interaction.reply).toHaveBeenCalledWith({
      content: "✅ **Architect** assigned to **Alice** until 2025-01-01 03:00 UTC.",
      flags: MessageFlags.Ephemeral,
    });
    expect(getStatus("Architect")?.holder).toEqual({
      ign: "Alice",
      coords: "-",
      discordId: "user-123",
      claimedAt: new Date("2025-01-01T00:00:00Z"),
      expiresAt: new Date("2025-01-01T03:00:00Z"),
    });
  });

  it("honours coordinates and a custom duration", async () => {
    const interaction = assignInteraction({ coords: " 7:8 " }, 1.5);

    await execute(createTestCommandContext(interaction));

    expect(getStatus("Architect")?.holder).toMatchObject({
      coords: "7:8",
      expiresAt: new Date("2025-01-01T01:30:00Z"),
    });
  });

  it("will not overwrite a current holder", async () => {
    assign("Architect", "Bob", "1:1", "222", new Date("2024-12-31T23:00:00Z"), new Date("2025-01-01T02:00:00Z"));
    const interaction = assignInteraction({});

    await execute(createTestCommandContext(interaction));

    expect(interaction.reply).toHaveBeenCalledWith({
      content: "**Architect** is already held by **Bob**.",
      flags: MessageFlags.Ephemeral,
    });
    expect(getStatus("Architect")?.holder?.ign).toBe("Bob");
  });

  it("rejects a blank in-game name", async () => {
    const interaction = assignInteraction({ ign: "   " });

    await execute(createTestCommandContext(interaction));

    expect(interaction.reply).toHaveBeenCalledWith({
      content: "In-game name must not be empty.",
      flags: MessageFlags.Ephemeral,
    });
  });
});
