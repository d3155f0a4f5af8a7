/**
 * Titlekeeper — src/store/titleStore.ts
 * WHAT: Persistent store for title holders, reservations and the two idempotency markers.
 * FLOWS:
 *  - initialize(catalog) → schema + one vacant row per new catalog title
 *  - assign/release → titles row
 *  - reserveSlot → single INSERT … ON CONFLICT DO NOTHING (the only double-booking guard)
 *  - cancelReservation → schedule row + activation marker in one transaction
 *  - mark/was ReminderSent, mark/was SlotActivated → set-membership tables
 *
 * Failure semantics: "slot taken" is a `false` return, never an exception. Every
 * other driver failure surfaces as StorageError; nothing here retries.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { db } from "../db/db.js";
import { ensureTitleSchema } from "../db/ensure.js";
import type { Catalog, CatalogEntry } from "../config/catalog.js";
import { ParseError, StorageError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { parseInstant } from "../lib/time.js";

// ===== Types =====

export interface TitleHolder {
  ign: string;
  coords: string;
  /** Discord snowflake as a string; "0" for holders promoted from a reservation */
  discordId: string;
  claimedAt: Date;
  expiresAt: Date;
}

/**
 * A title is either held (every holder field present) or vacant (`holder: null`).
 * There is no partial state.
 */
export interface TitleStatus {
  name: string;
  holder: TitleHolder | null;
}

export interface Reservation {
  titleName: string;
  slotKey: string;
  reserverIgn: string;
}

/** title name → (slot key → reserver IGN); slot keys ascending */
export type ScheduleMap = Map<string, Map<string, string>>;

type TitleRow = {
  name: string;
  holder_ign: string | null;
  holder_coords: string | null;
  holder_discord_id: string | null;
  claim_date: string | null;
  expiry_date: string | null;
};

type ScheduleRow = {
  title_name: string;
  slot_key: string;
  reserver_ign: string;
};

// Catalog handed to initialize(); drives ordering and membership
let catalog: Catalog = [];

function guard<T>(operation: string, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    if (err instanceof StorageError) throw err;
    throw new StorageError(operation, err);
  }
}

function toStatus(row: TitleRow): TitleStatus {
  const { holder_ign, holder_coords, holder_discord_id, claim_date, expiry_date } = row;
  if (
    holder_ign === null ||
    holder_coords === null ||
    holder_discord_id === null ||
    claim_date === null ||
    expiry_date === null
  ) {
    return { name: row.name, holder: null };
  }
  return {
    name: row.name,
    holder: {
      ign: holder_ign,
      coords: holder_coords,
      discordId: holder_discord_id,
      claimedAt: parseInstant(claim_date),
      expiresAt: parseInstant(expiry_date),
    },
  };
}

// ===== Catalog / lifecycle =====

/**
 * Idempotent. Creates the schema if absent and inserts a vacant row for every
 * catalog title that has none. Existing rows are never touched.
 */
export function initialize(entries: Catalog): void {
  guard("initialize", () => {
    ensureTitleSchema();
    const insert = db.prepare<[string]>(
      `INSERT INTO titles (name) VALUES (?) ON CONFLICT(name) DO NOTHING`
    );
    const seed = db.transaction((names: string[]) => {
      let created = 0;
      for (const name of names) {
        created += insert.run(name).changes;
      }
      return created;
    });
    const created = seed(entries.map((e) => e.name));
    catalog = entries;
    logger.info({ titles: entries.length, created }, "[store] initialized");
  });
}

export function getCatalog(): Catalog {
  return catalog;
}

export function getCatalogEntry(titleName: string): CatalogEntry | undefined {
  return catalog.find((entry) => entry.name === titleName);
}

// ===== Title status =====

export interface StatusScan {
  statuses: TitleStatus[];
  /** Catalog titles whose stored instants could not be decoded */
  unreadable: string[];
}

/**
 * One status per readable catalog title, in catalog order. A row with a
 * malformed instant is logged and listed under `unreadable` instead.
 */
export function scanStatuses(): StatusScan {
  return guard("getAllStatuses", () => {
    const rows = db
      .prepare<[], TitleRow>(
        `SELECT name, holder_ign, holder_coords, holder_discord_id, claim_date, expiry_date FROM titles`
      )
      .all();
    const byName = new Map(rows.map((row) => [row.name, row]));
    const scan: StatusScan = { statuses: [], unreadable: [] };

    for (const entry of catalog) {
      const row = byName.get(entry.name);
      if (!row) {
        scan.statuses.push({ name: entry.name, holder: null });
        continue;
      }
      try {
        scan.statuses.push(toStatus(row));
      } catch (err) {
        if (!(err instanceof ParseError)) throw err;
        scan.unreadable.push(entry.name);
        logger.error({ err, titleName: entry.name }, "[store] unreadable title row; skipped");
      }
    }
    return scan;
  });
}

/**
 * One status per catalog title, in catalog order. Unreadable rows are left out.
 */
export function getAllStatuses(): TitleStatus[] {
  return scanStatuses().statuses;
}

/**
 * undefined when the title is not in the catalog.
 */
export function getStatus(titleName: string): TitleStatus | undefined {
  if (!getCatalogEntry(titleName)) return undefined;
  return guard("getStatus", () => {
    const row = db
      .prepare<[string], TitleRow>(
        `SELECT name, holder_ign, holder_coords, holder_discord_id, claim_date, expiry_date
           FROM titles WHERE name = ?`
      )
      .get(titleName);
    return row ? toStatus(row) : { name: titleName, holder: null };
  });
}

/**
 * Overwrites the holder unconditionally. Checking vacancy is the caller's job.
 */
export function assign(
  titleName: string,
  holderIgn: string,
  holderCoords: string,
  holderDiscordId: string,
  claimInstant: Date,
  expiryInstant: Date
): void {
  guard("assign", () => {
    const result = db
      .prepare<[string, string, string, string, string, string]>(
        `UPDATE titles
            SET holder_ign = ?, holder_coords = ?, holder_discord_id = ?, claim_date = ?, expiry_date = ?
          WHERE name = ?`
      )
      .run(
        holderIgn,
        holderCoords,
        holderDiscordId,
        claimInstant.toISOString(),
        expiryInstant.toISOString(),
        titleName
      );
    if (result.changes === 0) {
      throw new Error(`no status row for title "${titleName}"`);
    }
  });
}

/**
 * Clears every holder field. Releasing a vacant title is a no-op.
 */
export function release(titleName: string): void {
  guard("release", () => {
    db.prepare<[string]>(
      `UPDATE titles
          SET holder_ign = NULL, holder_coords = NULL, holder_discord_id = NULL,
              claim_date = NULL, expiry_date = NULL
        WHERE name = ?`
    ).run(titleName);
  });
}

// ===== Reservations =====

/**
 * Check-and-insert as one statement. false (and no side effect) when the
 * (title, slot) pair is already reserved.
 */
export function reserveSlot(titleName: string, slotKey: string, reserverIgn: string): boolean {
  return guard("reserveSlot", () => {
    const result = db
      .prepare<[string, string, string]>(
        `INSERT INTO schedules (title_name, slot_key, reserver_ign) VALUES (?, ?, ?)
         ON CONFLICT(title_name, slot_key) DO NOTHING`
      )
      .run(titleName, slotKey, reserverIgn);
    return result.changes === 1;
  });
}

export function getReservation(titleName: string, slotKey: string): string | undefined {
  return guard("getReservation", () => {
    const row = db
      .prepare<[string, string], { reserver_ign: string }>(
        `SELECT reserver_ign FROM schedules WHERE title_name = ? AND slot_key = ?`
      )
      .get(titleName, slotKey);
    return row?.reserver_ign;
  });
}

/**
 * Deletes the reservation and its activation marker together. Returns whether a
 * reservation existed.
 */
export function cancelReservation(titleName: string, slotKey: string): boolean {
  return guard("cancelReservation", () => {
    const deleteSchedule = db.prepare<[string, string]>(
      `DELETE FROM schedules WHERE title_name = ? AND slot_key = ?`
    );
    const deleteMarker = db.prepare<[string, string]>(
      `DELETE FROM activated_slots WHERE title_name = ? AND slot_key = ?`
    );
    const tx = db.transaction((title: string, slot: string) => {
      const removed = deleteSchedule.run(title, slot).changes;
      deleteMarker.run(title, slot);
      return removed > 0;
    });
    return tx(titleName, slotKey);
  });
}

/**
 * Title of any reservation this IGN (case-insensitive) already holds at the slot.
 */
export function isIgnBookedForSlot(ign: string, slotKey: string): string | undefined {
  return guard("isIgnBookedForSlot", () => {
    const row = db
      .prepare<[string, string], { title_name: string }>(
        `SELECT title_name FROM schedules
          WHERE slot_key = ? AND reserver_ign = ? COLLATE NOCASE
          ORDER BY title_name LIMIT 1`
      )
      .get(slotKey, ign.trim());
    return row?.title_name;
  });
}

/**
 * Every reservation, ordered by slot key then title name.
 */
export function getAllReservations(): Reservation[] {
  return guard("getAllReservations", () =>
    db
      .prepare<[], ScheduleRow>(
        `SELECT title_name, slot_key, reserver_ign FROM schedules ORDER BY slot_key, title_name`
      )
      .all()
      .map((row) => ({
        titleName: row.title_name,
        slotKey: row.slot_key,
        reserverIgn: row.reserver_ign,
      }))
  );
}

export function getAllSchedules(): ScheduleMap {
  const schedules: ScheduleMap = new Map();
  for (const r of getAllReservations()) {
    let slots = schedules.get(r.titleName);
    if (!slots) {
      slots = new Map();
      schedules.set(r.titleName, slots);
    }
    slots.set(r.slotKey, r.reserverIgn);
  }
  return schedules;
}

// ===== Idempotency markers =====

export function markReminderSent(slotKey: string): void {
  guard("markReminderSent", () => {
    db.prepare<[string]>(
      `INSERT INTO sent_reminders (slot_key) VALUES (?) ON CONFLICT(slot_key) DO NOTHING`
    ).run(slotKey);
  });
}

export function wasReminderSent(slotKey: string): boolean {
  return guard("wasReminderSent", () => {
    const row = db
      .prepare<[string], { one: number }>(`SELECT 1 AS one FROM sent_reminders WHERE slot_key = ?`)
      .get(slotKey);
    return row !== undefined;
  });
}

export function markSlotActivated(titleName: string, slotKey: string): void {
  guard("markSlotActivated", () => {
    db.prepare<[string, string]>(
      `INSERT INTO activated_slots (title_name, slot_key) VALUES (?, ?)
       ON CONFLICT(title_name, slot_key) DO NOTHING`
    ).run(titleName, slotKey);
  });
}

export function wasSlotActivated(titleName: string, slotKey: string): boolean {
  return guard("wasSlotActivated", () => {
    const row = db
      .prepare<[string, string], { one: number }>(
        `SELECT 1 AS one FROM activated_slots WHERE title_name = ? AND slot_key = ?`
      )
      .get(titleName, slotKey);
    return row !== undefined;
  });
}
