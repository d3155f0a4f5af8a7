/**
 * Titlekeeper — tests/commands/unschedule.test.ts
 * WHAT: /unschedule ownership rules and reply text.
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
import { describeCancelResult, execute } from "../../src/commands/unschedule.js";
import { getReservation, reserveSlot } from "../../src/store/titleStore.js";
import { resetTitleStore } from "../utils/dbFixtures.js";
import { createMockInteraction } from "../utils/discordMocks.js";
import { createTestCommandContext } from "../utils/contextFactory.js";

const SLOT = "2025-01-02T06:00:00";

function unscheduleInteraction(displayName: string, isAdmin = false, title = "Architect") {
  return createMockInteraction({
    options: { getString: { title, date: "2025-01-02", time: "06:00" } },
    displayName,
    isAdmin,
  });
}

describe("/unschedule", () => {
  beforeEach(() => {
    resetTitleStore(db);
    reserveSlot("Architect", SLOT, "Alice");
  });

  it("lets the reserver cancel by display name", async () => {
    const interaction = unscheduleInteraction("alice");

    await execute(createTestCommandContext(interaction));

    expect(interaction.reply).toHaveBeenCalledWith({
      content: "Cancelled **Architect** at 2025-01-02 06:00 UTC (was booked by **Alice**).",
      flags: MessageFlags.Ephemeral,
    });
    expect(getReservation("Architect", SLOT)).toBeUndefined();
  });

  it("refuses someone else's booking", async () => {
    const interaction = unscheduleInteraction("Bob");

    await execute(createTestCommandContext(interaction));

    expect(interaction.reply).toHaveBeenCalledWith({
      content: "That slot is booked by **Alice**; only they or an administrator can cancel it.",
      flags: MessageFlags.Ephemeral,
    });
    expect(getReservation("Architect", SLOT)).toBe("Alice");
    expect(mockLogger.info).toHaveBeenCalledWith(
      { titleName: "Architect", slot: SLOT, userId: "user-123" },
      "[cmd] unschedule refused: not owner"
    );
  });

  it("lets an administrator cancel anyone", async () => {
    const interaction = unscheduleInteraction("Bob", true);

    await execute(createTestCommandContext(interaction));

    expect(getReservation("Architect", SLOT)).toBeUndefined();
  });

  it("reports a missing booking", async () => {
    const interaction = unscheduleInteraction("Alice", false, "General");

    await execute(createTestCommandContext(interaction));

    expect(interaction.reply).toHaveBeenCalledWith({
      content: "No booking for **General** at 2025-01-02 06:00 UTC.",
      flags: MessageFlags.Ephemeral,
    });
  });

  it("describes an unknown title", () => {
    expect(describeCancelResult({ kind: "unknown_title" }, "Emperor", SLOT)).toBe('Unknown title "Emperor".');
  });
});
