/**
 * Titlekeeper — tests/commands/titles.test.ts
 * WHAT: /titles status board rendering and its public reply.
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

import { EmbedBuilder } from "discord.js";
import { db } from "../../src/db/db.js";
import { buildTitlesEmbed, execute } from "../../src/commands/titles.js";
import type { UpcomingReservation } from "../../src/features/reservations.js";
import { assign, reserveSlot } from "../../src/store/titleStore.js";
import { resetTitleStore } from "../utils/dbFixtures.js";
import { createMockInteraction } from "../utils/discordMocks.js";
import { createTestCommandContext } from "../utils/contextFactory.js";

const AT = new Date("2025-01-01T01:00:00Z");

function upcoming(titleName: string, slotKey: string, reserverIgn: string): UpcomingReservation {
  const shiftStart = new Date(`${slotKey}Z`);
  return { titleName, slotKey, reserverIgn, shiftStart, shiftEnd: new Date(shiftStart.getTime() + 3 * 3_600_000) };
}

describe("/titles", () => {
  describe("buildTitlesEmbed", () => {
    it("shows holders, vacancies and upcoming bookings", () => {
      const data = buildTitlesEmbed(
        [
          {
            name: "Architect",
            holder: {
              ign: "Alice",
              coords: "1:2",
              discordId: "111",
              claimedAt: new Date("2025-01-01T00:00:00Z"),
              expiresAt: new Date("2025-01-01T03:14:00Z"),
            },
          },
          { name: "General", holder: null },
        ],
        [upcoming("General", "2025-01-01T03:00:00", "Bob")],
        AT
      ).toJSON();

      expect(data.title).toBe("Title Status");
      expect(data.fields).toEqual([
        { name: "Architect", value: "**Alice** (1:2)\nTime left: 2h 14m", inline: true },
        { name: "General", value: "Vacant", inline: true },
        { name: "Upcoming (next 7 days)", value: "`2025-01-01 03:00 UTC` **General**: Bob" },
      ]);
    });

    it("says so when nothing is booked", () => {
      const data = buildTitlesEmbed([], [], AT).toJSON();
      expect(data.fields).toEqual([{ name: "Upcoming (next 7 days)", value: "No bookings." }]);
    });

    it("caps the upcoming list", () => {
      const many = Array.from({ length: 17 }, (_, i) =>
        upcoming("Prefect", `2025-01-0${1 + Math.floor(i / 8)}T${String((i % 8) * 3).padStart(2, "0")}:00:00`, `P${i}`)
      );
      const value = buildTitlesEmbed([], many, AT).toJSON().fields?.[0]?.value ?? "";
      const lines = value.split("\n");

      expect(lines).toHaveLength(16);
      expect(lines[15]).toBe("…and 2 more");
    });
  });

  describe("execute", () => {
    beforeEach(() => {
      resetTitleStore(db);
      vi.useFakeTimers({ toFake: ["Date"] });
      vi.setSystemTime(AT);
    });

    it("defers publicly and edits in the board from the store", async () => {
      assign("Governor", "Carol", "5:5", "333", new Date("2025-01-01T00:00:00Z"), new Date("2025-01-01T02:30:00Z"));
      reserveSlot("Architect", "2025-01-01T06:00:00", "Dana");
      const interaction = createMockInteraction();
      const ctx = createTestCommandContext(interaction);

      await execute(ctx);

      expect(interaction.deferReply).toHaveBeenCalledWith({});
      expect(ctx.phases).toEqual(["load", "reply"]);
      const payload = vi.mocked(interaction.editReply).mock.calls[0]?.[0];
      const embeds = typeof payload === "object" && "embeds" in payload ? payload.embeds ?? [] : [];
      const embed = embeds[0];
      expect(embed).toBeInstanceOf(EmbedBuilder);
      const fields = embed instanceof EmbedBuilder ? embed.toJSON().fields ?? [] : [];
      expect(fields.find((f) => f.name === "Governor")?.value).toBe("**Carol** (5:5)\nTime left: 1h 30m");
      expect(fields.find((f) => f.name === "Architect")?.value).toBe("Vacant");
      expect(fields[fields.length - 1]?.value).toBe("`2025-01-01 06:00 UTC` **Architect**: Dana");
    });
  });
});
