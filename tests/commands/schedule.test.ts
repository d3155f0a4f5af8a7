/**
 * Titlekeeper — tests/commands/schedule.test.ts
 * WHAT: /schedule books through submitBooking and replies with the outcome.
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
import { data, execute } from "../../src/commands/schedule.js";
import { setActiveNotifier, type Notifier } from "../../src/features/notifier.js";
import { ParseError } from "../../src/lib/errors.js";
import { getReservation, reserveSlot } from "../../src/store/titleStore.js";
import { resetTitleStore } from "../utils/dbFixtures.js";
import { createMockInteraction } from "../utils/discordMocks.js";
import { createTestCommandContext } from "../utils/contextFactory.js";

function scheduleInteraction(strings: Record<string, string | null>, isAdmin = false) {
  return createMockInteraction({
    options: { getString: { date: "2025-01-02", time: "06:00", ...strings } },
    isAdmin,
  });
}

describe("/schedule", () => {
  let notify: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    resetTitleStore(db);
    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(new Date("2025-01-01T12:00:00Z"));
    notify = vi.fn().mockResolvedValue(undefined);
    const notifier: Notifier = { name: "test", notify };
    setActiveNotifier(notifier);
  });

  it("declares title, ign, date, time and optional coords", () => {
    const json = data.toJSON();
    expect(json.name).toBe("schedule");
    expect(json.options?.map((o) => o.name)).toEqual(["title", "ign", "date", "time", "coords"]);
  });

  it("books a requestable title and announces the request", async () => {
    const interaction = scheduleInteraction({ title: "architect", ign: "Alice", coords: "10:20" });
    const ctx = createTestCommandContext(interaction);

    await execute(ctx);

    expect(interaction.reply).toHaveBeenCalledWith({
      content: "Booked 'Architect' for **Alice** on 2025-01-02 at 06:00 UTC.",
      flags: MessageFlags.Ephemeral,
    });
    expect(getReservation("Architect", "2025-01-02T06:00:00")).toBe("Alice");
    expect(notify).toHaveBeenCalledWith({
      kind: "request",
      titleName: "Architect",
      ign: "Alice",
      coords: "10:20",
      slotKey: "2025-01-02T06:00:00",
      submittedBy: "testuser#0",
    });
    expect(ctx.phases).toEqual(["parse_slot", "reserve", "reply"]);
  });

  it("names the holder of a taken slot", async () => {
    reserveSlot("General", "2025-01-02T06:00:00", "Bob");
    const interaction = scheduleInteraction({ title: "General", ign: "Alice" });

    await execute(createTestCommandContext(interaction));

    expect(interaction.reply).toHaveBeenCalledWith({
      content: "This slot is already booked by **Bob**.",
      flags: MessageFlags.Ephemeral,
    });
  });

  it("lists valid titles for an unknown one", async () => {
    const interaction = scheduleInteraction({ title: "Emperor", ign: "Alice" });

    await execute(createTestCommandContext(interaction));

    expect(interaction.reply).toHaveBeenCalledWith({
      content: 'Unknown title "Emperor". Valid titles: Architect, General, Governor, Prefect, Duke.',
      flags: MessageFlags.Ephemeral,
    });
  });

  it("keeps non-requestable titles for administrators", async () => {
    const member = scheduleInteraction({ title: "Duke", ign: "Alice" });
    await execute(createTestCommandContext(member));
    expect(member.reply).toHaveBeenCalledWith({
      content: "**Duke** cannot be requested; ask an administrator.",
      flags: MessageFlags.Ephemeral,
    });

    const admin = scheduleInteraction({ title: "Duke", ign: "Alice" }, true);
    await execute(createTestCommandContext(admin));
    expect(getReservation("Duke", "2025-01-02T06:00:00")).toBe("Alice");
  });

  it("refuses a shift that has already ended", async () => {
    const interaction = scheduleInteraction({ title: "Prefect", ign: "Alice", date: "2025-01-01", time: "06:00" });

    await execute(createTestCommandContext(interaction));

    expect(interaction.reply).toHaveBeenCalledWith({
      content: "That shift has already ended.",
      flags: MessageFlags.Ephemeral,
    });
  });

  it("lets a malformed time reach the command wrapper", async () => {
    const interaction = scheduleInteraction({ title: "Prefect", ign: "Alice", time: "6pm" });
    const ctx = createTestCommandContext(interaction);

    await expect(execute(ctx)).rejects.toThrow(ParseError);
    expect(ctx.currentPhase()).toBe("parse_slot");
    expect(interaction.reply).not.toHaveBeenCalled();
  });
});
