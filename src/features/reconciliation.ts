/**
 * Titlekeeper — src/features/reconciliation.ts
 * WHAT: One reconciliation tick over the title store: expire holders, remind
 *       upcoming shifts, promote reservations whose shift has begun.
 * FLOWS:
 *  - snapshot (statuses + reservations, read once)
 *  - expiry pass → release + "expired" notification
 *  - reminder pass → one "reminder" per slot inside the lead window → markReminderSent
 *  - activation pass → assign + markSlotActivated + "handoff" notification
 *
 * No timers live here; the scheduler decides when to call runTick and holds the
 * tick lock around it.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { AUTO_ACTIVATION_COORDS, AUTO_ACTIVATION_DISCORD_ID } from "../lib/constants.js";
import { logger, redact } from "../lib/logger.js";
import { MINUTE_MS, isWithinShift, parseInstant, shiftEnd } from "../lib/time.js";
import {
  assign,
  getAllReservations,
  getCatalogEntry,
  markReminderSent,
  markSlotActivated,
  release,
  scanStatuses,
  wasReminderSent,
  wasSlotActivated,
  type Reservation,
  type TitleHolder,
} from "../store/titleStore.js";
import { notifySafely, type Notifier, type ReminderBooking } from "./notifier.js";

export interface TickOptions {
  now: Date;
  notifier: Notifier;
  shiftHours: number;
  reminderLeadMinutes: number;
  notifyTimeoutMs: number;
}

export interface TickSummary {
  expired: number;
  reminded: number;
  activated: number;
  /** Activations skipped because the title was still held */
  deferred: number;
  /** Unreadable title rows, items skipped on a storage or parse error, and failed reminder dispatches */
  failures: number;
}

interface Snapshot {
  holders: Map<string, TitleHolder | null>;
  /** Titles whose row could not be decoded; left alone this tick */
  unreadable: Set<string>;
  reservations: Reservation[];
}

function takeSnapshot(): Snapshot {
  const scan = scanStatuses();
  const holders = new Map<string, TitleHolder | null>();
  for (const status of scan.statuses) {
    holders.set(status.name, status.holder);
  }
  return { holders, unreadable: new Set(scan.unreadable), reservations: getAllReservations() };
}

async function expiryPass(snap: Snapshot, opts: TickOptions, summary: TickSummary): Promise<void> {
  const nowMs = opts.now.getTime();

  for (const [titleName, holder] of snap.holders) {
    if (!holder || holder.expiresAt.getTime() > nowMs) continue;
    try {
      release(titleName);
    } catch (err) {
      summary.failures++;
      logger.error({ err, titleName }, "[lifecycle] release failed; skipping title");
      continue;
    }
    snap.holders.set(titleName, null);
    summary.expired++;
    logger.info({ titleName, holder: redact(holder.ign) }, "[lifecycle] title expired");

    await notifySafely(
      opts.notifier,
      { kind: "expired", titleName, holderIgn: holder.ign },
      opts.notifyTimeoutMs
    );
  }
}

async function reminderPass(snap: Snapshot, opts: TickOptions, summary: TickSummary): Promise<void> {
  const nowMs = opts.now.getTime();
  const leadMs = opts.reminderLeadMinutes * MINUTE_MS;

  const bySlot = new Map<string, ReminderBooking[]>();
  for (const r of snap.reservations) {
    const bookings = bySlot.get(r.slotKey) ?? [];
    bookings.push({ titleName: r.titleName, reserverIgn: r.reserverIgn });
    bySlot.set(r.slotKey, bookings);
  }

  for (const [slotKey, bookings] of bySlot) {
    try {
      const shiftStart = parseInstant(slotKey);
      const startMs = shiftStart.getTime();
      // Window is [start - lead, start); nothing is sent once the shift has begun
      if (nowMs < startMs - leadMs || nowMs >= startMs) continue;
      if (wasReminderSent(slotKey)) continue;

      const ok = await notifySafely(
        opts.notifier,
        { kind: "reminder", slotKey, shiftStart, shiftHours: opts.shiftHours, bookings },
        opts.notifyTimeoutMs
      );
      if (!ok) {
        // Not marked: retried next tick while still inside the window
        summary.failures++;
        continue;
      }
      markReminderSent(slotKey);
      summary.reminded++;
    } catch (err) {
      summary.failures++;
      logger.error({ err, slotKey }, "[lifecycle] reminder failed; skipping slot");
    }
  }
}

async function activationPass(snap: Snapshot, opts: TickOptions, summary: TickSummary): Promise<void> {
  for (const r of snap.reservations) {
    if (!getCatalogEntry(r.titleName)) {
      logger.debug(
        { titleName: r.titleName, slotKey: r.slotKey },
        "[lifecycle] title not in catalog; reservation ignored"
      );
      continue;
    }
    // Already counted as a failure when the snapshot was taken
    if (snap.unreadable.has(r.titleName)) continue;

    try {
      const shiftStart = parseInstant(r.slotKey);
      if (!isWithinShift(shiftStart, opts.now, opts.shiftHours)) continue;
      if (wasSlotActivated(r.titleName, r.slotKey)) continue;

      if (snap.holders.get(r.titleName)) {
        summary.deferred++;
        logger.debug(
          { titleName: r.titleName, slotKey: r.slotKey },
          "[lifecycle] title still held; activation deferred"
        );
        continue;
      }

      const expiresAt = shiftEnd(shiftStart, opts.shiftHours);
      assign(
        r.titleName,
        r.reserverIgn,
        AUTO_ACTIVATION_COORDS,
        AUTO_ACTIVATION_DISCORD_ID,
        shiftStart,
        expiresAt
      );
      markSlotActivated(r.titleName, r.slotKey);
      snap.holders.set(r.titleName, {
        ign: r.reserverIgn,
        coords: AUTO_ACTIVATION_COORDS,
        discordId: AUTO_ACTIVATION_DISCORD_ID,
        claimedAt: shiftStart,
        expiresAt,
      });
      summary.activated++;
      logger.info(
        { titleName: r.titleName, slotKey: r.slotKey, ign: redact(r.reserverIgn) },
        "[lifecycle] reservation activated"
      );

      await notifySafely(
        opts.notifier,
        {
          kind: "handoff",
          titleName: r.titleName,
          reserverIgn: r.reserverIgn,
          slotKey: r.slotKey,
          expiresAt,
        },
        opts.notifyTimeoutMs
      );
    } catch (err) {
      summary.failures++;
      logger.error(
        { err, titleName: r.titleName, slotKey: r.slotKey },
        "[lifecycle] activation failed; skipping reservation"
      );
    }
  }
}

/**
 * Runs the three passes in order against one snapshot. A failing snapshot read
 * rejects (nothing to reconcile). An unreadable title row counts as one failure
 * and is skipped; failures after that are isolated per item.
 */
export async function runTick(opts: TickOptions): Promise<TickSummary> {
  const snap = takeSnapshot();
  const summary: TickSummary = {
    expired: 0,
    reminded: 0,
    activated: 0,
    deferred: 0,
    failures: snap.unreadable.size,
  };

  await expiryPass(snap, opts, summary);
  await reminderPass(snap, opts, summary);
  await activationPass(snap, opts, summary);

  return summary;
}
