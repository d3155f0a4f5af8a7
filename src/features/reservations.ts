/**
 * Titlekeeper — src/features/reservations.ts
 * WHAT: Booking and cancelling future title shifts on behalf of the chat and web surfaces.
 * FLOWS:
 *  - reserve → catalog check → IGN conflict check → titleStore.reserveSlot (atomic insert)
 *  - cancel → lookup → ownership check → titleStore.cancelReservation
 *  - listUpcoming → reservations whose shift has not ended, within a horizon
 *
 * Outcomes callers are expected to handle (slot taken, not owner, ...) come back as
 * tagged results. StorageError and ParseError still throw.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger, redact } from "../lib/logger.js";
import { HOUR_MS, parseInstant, shiftEnd } from "../lib/time.js";
import {
  cancelReservation,
  getAllReservations,
  getCatalogEntry,
  getReservation,
  isIgnBookedForSlot,
  reserveSlot,
  type Reservation,
} from "../store/titleStore.js";

export type ReserveResult =
  | { kind: "booked"; titleName: string; slotKey: string; reserverIgn: string }
  | { kind: "slot_taken"; reserverIgn?: string }
  | { kind: "conflicting_booking"; otherTitle: string }
  | { kind: "unknown_title" }
  | { kind: "not_requestable" }
  | { kind: "invalid_ign" };

export type CancelResult =
  | { kind: "cancelled"; reserverIgn: string }
  | { kind: "not_found" }
  | { kind: "not_owner"; reserverIgn: string }
  | { kind: "unknown_title" };

export interface ReserveOptions {
  /**
   * false restricts booking to titles the catalog marks requestable.
   * Omitted means privileged (chat surface with its own permission checks).
   */
  privileged?: boolean;
}

export interface UpcomingReservation extends Reservation {
  shiftStart: Date;
  shiftEnd: Date;
}

/**
 * Books `slotKey` for `ign`. The slot key must already be normalised (see slotKey()).
 * Two concurrent calls for the same pair: exactly one gets `booked`, the other
 * `slot_taken` naming the winner. The winner is omitted only when the slot
 * flipped twice between insert and lookup.
 */
export function reserve(
  titleName: string,
  slotKey: string,
  ign: string,
  opts: ReserveOptions = {}
): ReserveResult {
  const entry = getCatalogEntry(titleName);
  if (!entry) return { kind: "unknown_title" };
  if (opts.privileged === false && !entry.requestable) return { kind: "not_requestable" };

  const reserverIgn = ign.trim();
  if (reserverIgn.length === 0) return { kind: "invalid_ign" };

  const otherTitle = isIgnBookedForSlot(reserverIgn, slotKey);
  if (otherTitle !== undefined) {
    return { kind: "conflicting_booking", otherTitle };
  }

  // A lookup that finds nothing means the winner cancelled in between; insert once more
  for (let attempt = 0; attempt < 2; attempt++) {
    if (reserveSlot(titleName, slotKey, reserverIgn)) {
      logger.info({ titleName, slotKey, ign: redact(reserverIgn) }, "[reserve] booked");
      return { kind: "booked", titleName, slotKey, reserverIgn };
    }
    const existing = getReservation(titleName, slotKey);
    if (existing !== undefined) return { kind: "slot_taken", reserverIgn: existing };
  }

  logger.warn({ titleName, slotKey }, "[reserve] slot changed hands during booking");
  return { kind: "slot_taken" };
}

/**
 * Cancels a reservation. Non-privileged requesters must match the reserver IGN
 * (case-insensitive). Also clears the slot's activation marker.
 */
export function cancel(
  titleName: string,
  slotKey: string,
  requestingIdentity: string,
  isPrivileged: boolean
): CancelResult {
  if (!getCatalogEntry(titleName)) return { kind: "unknown_title" };

  const reserverIgn = getReservation(titleName, slotKey);
  if (reserverIgn === undefined) return { kind: "not_found" };

  const sameIdentity = reserverIgn.toLowerCase() === requestingIdentity.trim().toLowerCase();
  if (!sameIdentity && !isPrivileged) {
    return { kind: "not_owner", reserverIgn };
  }

  if (!cancelReservation(titleName, slotKey)) {
    // Removed between the lookup and the delete
    return { kind: "not_found" };
  }
  logger.info(
    { titleName, slotKey, by: redact(requestingIdentity), privileged: isPrivileged },
    "[reserve] cancelled"
  );
  return { kind: "cancelled", reserverIgn };
}

/**
 * Reservations whose shift has not ended by `now` and starts before
 * `now + horizonDays`, ordered by slot then title.
 */
export function listUpcoming(now: Date, horizonDays: number, shiftHours: number): UpcomingReservation[] {
  const horizon = now.getTime() + horizonDays * 24 * HOUR_MS;
  const upcoming: UpcomingReservation[] = [];

  for (const r of getAllReservations()) {
    const start = parseInstant(r.slotKey);
    const end = shiftEnd(start, shiftHours);
    if (end.getTime() <= now.getTime() || start.getTime() >= horizon) continue;
    upcoming.push({ ...r, shiftStart: start, shiftEnd: end });
  }
  return upcoming;
}
