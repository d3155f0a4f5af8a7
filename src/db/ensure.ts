/**
 * Titlekeeper — src/db/ensure.ts
 * WHAT: On-start schema creation for the four title relations.
 * FLOWS: CREATE TABLE IF NOT EXISTS × 4 → supporting index
 * DOCS:
 *  - SQLite CREATE TABLE: https://sqlite.org/lang_createtable.html
 *
 * NOTE: Additive and idempotent; safe on every process start.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { db } from "./db.js";
import { logger } from "../lib/logger.js";

const SCHEMA: ReadonlyArray<string> = [
  // One row per catalog title, forever. Holder fields move together: all set or all NULL.
  // holder_discord_id is TEXT because snowflakes do not fit a JS number.
  `CREATE TABLE IF NOT EXISTS titles (
    name TEXT PRIMARY KEY,
    holder_ign TEXT,
    holder_coords TEXT,
    holder_discord_id TEXT,
    claim_date TEXT,
    expiry_date TEXT,
    CHECK (
      (holder_ign IS NULL AND holder_coords IS NULL AND holder_discord_id IS NULL
        AND claim_date IS NULL AND expiry_date IS NULL)
      OR
      (holder_ign IS NOT NULL AND holder_coords IS NOT NULL AND holder_discord_id IS NOT NULL
        AND claim_date IS NOT NULL AND expiry_date IS NOT NULL)
    )
  )`,
  // The composite key is the only double-booking guard
  `CREATE TABLE IF NOT EXISTS schedules (
    title_name TEXT NOT NULL,
    slot_key TEXT NOT NULL,
    reserver_ign TEXT NOT NULL,
    created_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
    PRIMARY KEY (title_name, slot_key)
  )`,
  `CREATE INDEX IF NOT EXISTS idx_schedules_slot_ign
    ON schedules (slot_key, reserver_ign COLLATE NOCASE)`,
  `CREATE TABLE IF NOT EXISTS sent_reminders (
    slot_key TEXT PRIMARY KEY,
    sent_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
  )`,
  `CREATE TABLE IF NOT EXISTS activated_slots (
    title_name TEXT NOT NULL,
    slot_key TEXT NOT NULL,
    activated_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
    PRIMARY KEY (title_name, slot_key)
  )`,
];

export function ensureTitleSchema(): void {
  const existing = db
    .prepare<[], { name: string }>(
      `SELECT name FROM sqlite_master WHERE type = 'table'
         AND name IN ('titles', 'schedules', 'sent_reminders', 'activated_slots')`
    )
    .all()
    .map((row) => row.name);

  for (const sql of SCHEMA) {
    db.prepare(sql).run();
  }

  if (existing.length < 4) {
    logger.info({ existing }, "[ensure] title schema created");
  }
}
