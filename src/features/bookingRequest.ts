/**
 * Titlekeeper — src/features/bookingRequest.ts
 * WHAT: A manual booking as both surfaces submit it: input checks, reserve, then the
 *       audit row and the "New Title Request" notification on success.
 * FLOWS: validate → past-shift check → reserve() → appendAuditRecord → notifySafely(request)
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { MAX_COORDS_LENGTH, MAX_IGN_LENGTH } from "../lib/constants.js";
import { parseInstant, shiftEnd } from "../lib/time.js";
import { appendAuditRecord } from "./auditLog.js";
import { notifySafely, type Notifier } from "./notifier.js";
import { reserve, type ReserveResult } from "./reservations.js";

export interface BookingRequest {
  titleName: string;
  ign: string;
  coords: string;
  slotKey: string;
  /** Discord tag of the submitter, or "web" */
  submittedBy: string;
  privileged: boolean;
}

export interface BookingDeps {
  now: Date;
  shiftHours: number;
  auditPath: string;
  notifier: Notifier;
  notifyTimeoutMs: number;
}

export type BookingResult =
  | ReserveResult
  | { kind: "past_slot" }
  | { kind: "invalid_input"; reason: string };

export async function submitBooking(req: BookingRequest, deps: BookingDeps): Promise<BookingResult> {
  const ign = req.ign.trim();
  const coords = req.coords.trim();
  if (ign.length > MAX_IGN_LENGTH) {
    return { kind: "invalid_input", reason: `In-game name must be at most ${MAX_IGN_LENGTH} characters.` };
  }
  if (coords.length > MAX_COORDS_LENGTH) {
    return { kind: "invalid_input", reason: `Coordinates must be at most ${MAX_COORDS_LENGTH} characters.` };
  }

  // A shift that has already ended cannot be booked; one in progress can
  const start = parseInstant(req.slotKey);
  if (shiftEnd(start, deps.shiftHours).getTime() <= deps.now.getTime()) {
    return { kind: "past_slot" };
  }

  const result = reserve(req.titleName, req.slotKey, ign, { privileged: req.privileged });
  if (result.kind !== "booked") return result;

  appendAuditRecord(deps.auditPath, {
    timestamp: deps.now,
    titleName: result.titleName,
    ign: result.reserverIgn,
    coords,
    submittedBy: req.submittedBy,
  });

  await notifySafely(
    deps.notifier,
    {
      kind: "request",
      titleName: result.titleName,
      ign: result.reserverIgn,
      coords,
      slotKey: result.slotKey,
      submittedBy: req.submittedBy,
    },
    deps.notifyTimeoutMs
  );

  return result;
}

/**
 * User-facing text for a booking outcome, shared by /schedule and the web form.
 */
export function describeBookingResult(result: BookingResult, titleInput: string, slotKey: string): string {
  switch (result.kind) {
    case "booked":
      return `Booked '${result.titleName}' for **${result.reserverIgn}** on ${slotKey.slice(0, 10)} at ${slotKey.slice(11, 16)} UTC.`;
    case "slot_taken":
      return result.reserverIgn === undefined
        ? "This slot is already booked."
        : `This slot is already booked by **${result.reserverIgn}**.`;
    case "conflicting_booking":
      return `That in-game name is already booked for **${result.otherTitle}** at this time.`;
    case "unknown_title":
      return `Unknown title "${titleInput}".`;
    case "not_requestable":
      return `**${titleInput}** cannot be requested; ask an administrator.`;
    case "invalid_ign":
      return "In-game name must not be empty.";
    case "past_slot":
      return "That shift has already ended.";
    case "invalid_input":
      return result.reason;
  }
}
