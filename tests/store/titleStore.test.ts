/**
 * Titlekeeper — tests/store/titleStore.test.ts
 * WHAT: The title store against in-memory SQLite: seeding, holders, reservations
 *       and the two idempotency markers.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi, beforeEach } from "vitest";

const { mockLogger } = vi.hoisted(() => ({
  mockLogger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
}));

vi.mock("../../src/lib/logger.js", () => ({ logger: mockLogger }));

import { db } from "../../src/db/db.js";
import { parseCatalog } from "../../src/config/catalog.js";
import { StorageError } from "../../src/lib/errors.js";
import {
  assign,
  cancelReservation,
  getAllReservations,
  getAllSchedules,
  getAllStatuses,
  getCatalogEntry,
  getReservation,
  getStatus,
  initialize,
  isIgnBookedForSlot,
  markReminderSent,
  markSlotActivated,
  release,
  reserveSlot,
  scanStatuses,
  wasReminderSent,
  wasSlotActivated,
} from "../../src/store/titleStore.js";
import { TEST_CATALOG, resetTitleStore } from "../utils/dbFixtures.js";

const CLAIM = new Date("2025-01-01T00:00:00Z");
const EXPIRY = new Date("2025-01-01T03:00:00Z");

describe("titleStore", () => {
  beforeEach(() => {
    resetTitleStore(db);
  });

  describe("initialize", () => {
    it("creates one vacant status per catalog title in catalog order", () => {
      expect(getAllStatuses()).toEqual(TEST_CATALOG.map((e) => ({ name: e.name, holder: null })));
    });

    it("is idempotent and never touches existing holders", () => {
      assign("Architect", "Alice", "1:2", "111", CLAIM, EXPIRY);
      initialize(TEST_CATALOG);
      expect(getStatus("Architect")?.holder?.ign).toBe("Alice");
      const count = db.prepare<[], { n: number }>("SELECT COUNT(*) AS n FROM titles").get();
      expect(count?.n).toBe(TEST_CATALOG.length);
    });

    it("adds rows for titles new to the catalog", () => {
      const extended = parseCatalog([...TEST_CATALOG, { name: "Marquis" }]);
      initialize(extended);
      expect(getStatus("Marquis")).toEqual({ name: "Marquis", holder: null });
      expect(getCatalogEntry("Marquis")?.requestable).toBe(false);
    });
  });

  describe("scanStatuses", () => {
    it("lists a row with a malformed instant as unreadable and keeps the others", () => {
      assign("Architect", "Alice", "1:2", "111", CLAIM, EXPIRY);
      db.prepare(
        `UPDATE titles
            SET holder_ign = 'Bob', holder_coords = '1:1', holder_discord_id = '222',
                claim_date = 'yesterday', expiry_date = '2025-01-01T03:00:00Z'
          WHERE name = 'General'`
      ).run();

      const scan = scanStatuses();

      expect(scan.unreadable).toEqual(["General"]);
      expect(scan.statuses.map((status) => status.name)).toEqual(["Architect", "Governor", "Prefect", "Duke"]);
      expect(scan.statuses[0].holder?.ign).toBe("Alice");
      expect(getAllStatuses()).toEqual(scan.statuses);
      expect(mockLogger.error).toHaveBeenCalledWith(
        expect.objectContaining({ titleName: "General" }),
        "[store] unreadable title row; skipped"
      );
    });
  });

  describe("holders", () => {
    it("assign sets every holder field", () => {
      assign("General", "Bob", "100:200", "222", CLAIM, EXPIRY);
      expect(getStatus("General")).toEqual({
        name: "General",
        holder: { ign: "Bob", coords: "100:200", discordId: "222", claimedAt: CLAIM, expiresAt: EXPIRY },
      });
    });

    it("assign overwrites an existing holder", () => {
      assign("General", "Bob", "1:1", "222", CLAIM, EXPIRY);
      assign("General", "Carol", "2:2", "333", CLAIM, EXPIRY);
      expect(getStatus("General")?.holder?.ign).toBe("Carol");
    });

    it("assign to a title with no row is a StorageError", () => {
      expect(() => assign("Emperor", "X", "-", "0", CLAIM, EXPIRY)).toThrow(StorageError);
    });

    it("release clears the holder and is a no-op when vacant", () => {
      assign("Prefect", "Dana", "3:3", "444", CLAIM, EXPIRY);
      release("Prefect");
      expect(getStatus("Prefect")?.holder).toBeNull();
      release("Prefect");
      expect(getStatus("Prefect")?.holder).toBeNull();
    });

    it("getStatus is undefined for titles outside the catalog", () => {
      expect(getStatus("Emperor")).toBeUndefined();
    });
  });

  describe("reservations", () => {
    const SLOT = "2025-01-01T00:00:00";

    it("reserveSlot inserts once and reports a taken slot as false", () => {
      expect(reserveSlot("Architect", SLOT, "Alice")).toBe(true);
      expect(reserveSlot("Architect", SLOT, "Bob")).toBe(false);
      expect(getReservation("Architect", SLOT)).toBe("Alice");
    });

    it("the same slot on another title is independent", () => {
      reserveSlot("Architect", SLOT, "Alice");
      expect(reserveSlot("General", SLOT, "Bob")).toBe(true);
    });

    it("isIgnBookedForSlot matches case-insensitively", () => {
      reserveSlot("Governor", SLOT, "Alice");
      expect(isIgnBookedForSlot("ALICE", SLOT)).toBe("Governor");
      expect(isIgnBookedForSlot("alice", "2025-01-01T03:00:00")).toBeUndefined();
    });

    it("cancelReservation removes the row and its activation marker", () => {
      reserveSlot("Architect", SLOT, "Alice");
      markSlotActivated("Architect", SLOT);

      expect(cancelReservation("Architect", SLOT)).toBe(true);
      expect(getReservation("Architect", SLOT)).toBeUndefined();
      expect(wasSlotActivated("Architect", SLOT)).toBe(false);
      expect(cancelReservation("Architect", SLOT)).toBe(false);
    });

    it("lists reservations by slot then title", () => {
      reserveSlot("General", "2025-01-01T03:00:00", "Bob");
      reserveSlot("Prefect", SLOT, "Carol");
      reserveSlot("Architect", SLOT, "Alice");

      expect(getAllReservations()).toEqual([
        { titleName: "Architect", slotKey: SLOT, reserverIgn: "Alice" },
        { titleName: "Prefect", slotKey: SLOT, reserverIgn: "Carol" },
        { titleName: "General", slotKey: "2025-01-01T03:00:00", reserverIgn: "Bob" },
      ]);
    });

    it("groups reservations per title", () => {
      reserveSlot("Architect", "2025-01-01T03:00:00", "Bob");
      reserveSlot("Architect", SLOT, "Alice");

      const schedules = getAllSchedules();
      expect([...schedules.keys()]).toEqual(["Architect"]);
      expect([...(schedules.get("Architect") ?? new Map()).entries()]).toEqual([
        [SLOT, "Alice"],
        ["2025-01-01T03:00:00", "Bob"],
      ]);
    });
  });

  describe("markers", () => {
    it("reminder marker is per slot", () => {
      expect(wasReminderSent("2025-01-01T00:00:00")).toBe(false);
      markReminderSent("2025-01-01T00:00:00");
      markReminderSent("2025-01-01T00:00:00");
      expect(wasReminderSent("2025-01-01T00:00:00")).toBe(true);
      expect(wasReminderSent("2025-01-01T03:00:00")).toBe(false);
    });

    it("activation marker is per title and slot", () => {
      markSlotActivated("Architect", "2025-01-01T00:00:00");
      expect(wasSlotActivated("Architect", "2025-01-01T00:00:00")).toBe(true);
      expect(wasSlotActivated("General", "2025-01-01T00:00:00")).toBe(false);
    });
  });
});
