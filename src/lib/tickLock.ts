/**
 * Titlekeeper — src/lib/tickLock.ts
 * WHAT: One process-wide ordering lock for title state changes.
 * FLOWS:
 *  - lifecycle tick → withTickLock("tick", runTick)
 *  - /assign, /release → withTickLock("assign" | "release", ...)
 *
 * A whole tick is one critical section, so a manual release can never land
 * between the expiry and activation passes. Reservation inserts do not take the
 * lock; the schedules primary key already serializes them.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "./logger.js";

let tail: Promise<void> = Promise.resolve();
let pending = 0;

/**
 * Runs fn after every previously queued holder has settled. A rejection is
 * returned to the caller and does not poison the queue.
 */
export function withTickLock<T>(label: string, fn: () => Promise<T>): Promise<T> {
  const queuedAt = Date.now();
  pending++;

  const run = tail.then(() => {
    const waitedMs = Date.now() - queuedAt;
    if (waitedMs > 0) {
      logger.debug({ label, waitedMs }, "[lock] acquired");
    }
    return fn();
  });

  tail = run.then(
    () => {
      pending--;
    },
    () => {
      pending--;
    }
  );

  return run;
}

/** Number of holders queued or running */
export function tickLockDepth(): number {
  return pending;
}
