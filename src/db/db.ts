/**
 * Titlekeeper — src/db/db.ts
 * WHAT: SQLite connection bootstrap for the title store.
 * FLOWS: Open DB → set PRAGMAs → export `db` → closeDatabase() on shutdown
 * DOCS:
 *  - better-sqlite3 API: https://github.com/WiseLibs/better-sqlite3/blob/master/docs/api.md
 *  - SQLite PRAGMA: https://sqlite.org/pragma.html
 *
 * NOTE: better-sqlite3 is synchronous. Every statement runs to completion on
 * the event loop, so no two statements from this process ever interleave.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import Database from "better-sqlite3";
import fs from "node:fs";
import path from "node:path";
import { env } from "../lib/env.js";
import { logger } from "../lib/logger.js";

const DB_BUSY_TIMEOUT_MS = 5000;

const dbPath = env.DB_PATH;
if (dbPath !== ":memory:") {
  fs.mkdirSync(path.dirname(dbPath), { recursive: true });
}

export const db: Database.Database = new Database(dbPath, { fileMustExist: false });
// WAL: the web surface reads while the tick writes
db.pragma("journal_mode = WAL");
db.pragma("synchronous = NORMAL");
db.pragma("foreign_keys = ON");
db.pragma(`busy_timeout = ${DB_BUSY_TIMEOUT_MS}`);
logger.info({ dbPath }, "[db] SQLite opened");

export function closeDatabase(): void {
  try {
    db.close();
    logger.info("[db] closed");
  } catch (err) {
    logger.error({ err }, "[db] error closing database");
  }
}
