/**
 * Titlekeeper — src/lib/time.ts
 * WHAT: UTC instant parsing and the canonical slot key for a shift start.
 * FLOWS:
 *  - parseInstant("2025-01-01 18:30+02:00") → Date (UTC epoch)
 *  - slotKey(date) → "2025-01-01T16:30:00"
 *  - isWithinShift(start, now, hours) → start <= now < start + hours
 *
 * NOTE: The slot key is the join key between schedules, sent_reminders and
 * activated_slots. Any two instants in the same UTC minute must map to the same string.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { ParseError } from "./errors.js";

export const MINUTE_MS = 60_000;
export const HOUR_MS = 60 * MINUTE_MS;

// date, optional time (T or space), optional seconds/fraction, optional offset
const INSTANT_RE =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:[.,](\d+))?)?)?\s*(Z|[+-]\d{2}(?::?\d{2})?)?$/i;
const DATE_RE = /^\d{4}-\d{2}-\d{2}$/;
const CLOCK_RE = /^(\d{1,2}):(\d{2})$/;

export const now = (): Date => new Date();

const MONTH_DAYS = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

function daysInMonth(year: number, month: number): number {
  const leap = (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
  if (month === 2 && leap) return 29;
  return MONTH_DAYS[month - 1] ?? 0;
}

/**
 * Parses an ISO-8601 timestamp. No offset means UTC. A bare date means midnight UTC.
 *
 * @throws ParseError on anything else, including out-of-range fields like Feb 30 or 24:00.
 * @example
 * parseInstant("2025-01-01T00:00:00")       // 2025-01-01T00:00:00.000Z
 * parseInstant("2025-01-01 05:30+05:30")    // 2025-01-01T00:00:00.000Z
 */
export function parseInstant(input: string): Date {
  const s = input.trim();
  const m = INSTANT_RE.exec(s);
  if (!m) {
    throw new ParseError(`Not an ISO-8601 timestamp: "${s}"`, input);
  }

  const year = Number(m[1]);
  const month = Number(m[2]);
  const day = Number(m[3]);
  const hour = Number(m[4] ?? "0");
  const minute = Number(m[5] ?? "0");
  const second = Number(m[6] ?? "0");
  // Sub-millisecond digits are dropped, not rounded
  const millis = m[7] ? Number(m[7].padEnd(3, "0").slice(0, 3)) : 0;

  if (
    month < 1 ||
    month > 12 ||
    day < 1 ||
    day > daysInMonth(year, month) ||
    hour > 23 ||
    minute > 59 ||
    second > 59
  ) {
    throw new ParseError(`Timestamp out of range: "${s}"`, input);
  }

  const d = new Date(0);
  d.setUTCFullYear(year, month - 1, day);
  d.setUTCHours(hour, minute, second, millis);

  const offset = m[8];
  if (offset && offset.toUpperCase() !== "Z") {
    const sign = offset.startsWith("-") ? -1 : 1;
    const digits = offset.slice(1).replace(":", "");
    const offHours = Number(digits.slice(0, 2));
    const offMinutes = digits.length > 2 ? Number(digits.slice(2, 4)) : 0;
    if (offHours > 23 || offMinutes > 59) {
      throw new ParseError(`Invalid UTC offset in "${s}"`, input);
    }
    return new Date(d.getTime() - sign * (offHours * HOUR_MS + offMinutes * MINUTE_MS));
  }

  return d;
}

/**
 * Canonical, offset-free identity of a shift start: "YYYY-MM-DDTHH:MM:00" in UTC.
 * Seconds and milliseconds are truncated.
 */
export function slotKey(instant: Date): string {
  if (Number.isNaN(instant.getTime())) {
    throw new ParseError("Invalid date", String(instant));
  }
  return `${instant.toISOString().slice(0, 16)}:00`;
}

/**
 * Slot key from the separate date ("YYYY-MM-DD") and time ("HH:MM") fields the
 * booking form and /schedule take. Both are UTC.
 */
export function slotKeyFromParts(date: string, time: string): string {
  const d = date.trim();
  const clock = CLOCK_RE.exec(time.trim());
  if (!DATE_RE.test(d) || !clock) {
    throw new ParseError(`Expected date YYYY-MM-DD and time HH:MM, got "${date}" "${time}"`, `${date} ${time}`);
  }
  const hh = (clock[1] ?? "").padStart(2, "0");
  return slotKey(parseInstant(`${d}T${hh}:${clock[2]}:00Z`));
}

export function shiftEnd(slotStart: Date, shiftDurationHours: number): Date {
  return new Date(slotStart.getTime() + shiftDurationHours * HOUR_MS);
}

/**
 * true iff slotStart <= now < slotStart + shiftDurationHours
 */
export function isWithinShift(slotStart: Date, now: Date, shiftDurationHours: number): boolean {
  const t = now.getTime();
  return slotStart.getTime() <= t && t < shiftEnd(slotStart, shiftDurationHours).getTime();
}

/**
 * WHAT: Human-readable UTC time for embeds and replies.
 * FORMAT: "2025-10-20 18:42 UTC"
 */
export function formatUtc(instant: Date): string {
  return instant
    .toISOString()
    .replace("T", " ")
    .replace(/:\d{2}\.\d{3}Z$/, " UTC");
}

/**
 * "2h 14m" style remaining time. Zero or negative renders as "expired".
 */
export function formatRemaining(ms: number): string {
  if (ms <= 0) return "expired";
  const totalMinutes = Math.floor(ms / MINUTE_MS);
  const hours = Math.floor(totalMinutes / 60);
  const minutes = totalMinutes % 60;
  if (hours === 0) return `${minutes}m`;
  return `${hours}h ${minutes}m`;
}
