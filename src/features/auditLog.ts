/**
 * Titlekeeper — src/features/auditLog.ts
 * WHAT: Append-only CSV record of successful manual reservations.
 * FLOWS: appendAuditRecord(path, record) → header on first write → one RFC 4180 row
 * DOCS:
 *  - RFC 4180 CSV: https://datatracker.ietf.org/doc/html/rfc4180
 *
 * NOTE: Write-only. Nothing in the process reads this file back.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import fs from "node:fs";
import path from "node:path";
import { logger } from "../lib/logger.js";

export const AUDIT_CSV_HEADER = "timestamp,title_name,in_game_name,coordinates,discord_user";

export interface AuditRecord {
  timestamp: Date;
  titleName: string;
  ign: string;
  coords: string;
  /** Discord tag, or "web" for the booking form */
  submittedBy: string;
}

/**
 * Quotes a field containing a delimiter, quote or line break; doubles inner quotes.
 */
export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function formatAuditRow(record: AuditRecord): string {
  return [
    record.timestamp.toISOString(),
    record.titleName,
    record.ign,
    record.coords,
    record.submittedBy,
  ]
    .map(escapeCsvField)
    .join(",");
}

/**
 * Appends one row. Returns false (and logs) on any filesystem failure; the
 * reservation it records has already succeeded.
 */
export function appendAuditRecord(filePath: string, record: AuditRecord): boolean {
  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    const needsHeader = !fs.existsSync(filePath) || fs.statSync(filePath).size === 0;
    const lines = needsHeader
      ? `${AUDIT_CSV_HEADER}\n${formatAuditRow(record)}\n`
      : `${formatAuditRow(record)}\n`;
    fs.appendFileSync(filePath, lines, "utf-8");
    return true;
  } catch (err) {
    logger.error({ err, filePath, titleName: record.titleName }, "[audit] failed to append record");
    return false;
  }
}
