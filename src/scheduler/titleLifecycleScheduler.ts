/**
 * Titlekeeper — src/scheduler/titleLifecycleScheduler.ts
 * WHAT: Periodic driver for the reconciliation tick.
 * FLOWS:
 *  - start → one tick immediately → one tick every intervalSeconds
 *  - each tick: withTickLock → runTick → recordSchedulerRun
 * DOCS:
 *  - setInterval: https://nodejs.org/api/timers.html#setinterval
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { runTick, type TickSummary } from "../features/reconciliation.js";
import type { Notifier } from "../features/notifier.js";
import { logger } from "../lib/logger.js";
import { recordSchedulerRun } from "../lib/schedulerHealth.js";
import { withTickLock } from "../lib/tickLock.js";
import { now } from "../lib/time.js";

export const SCHEDULER_NAME = "titleLifecycle";

export interface LifecycleSchedulerOptions {
  notifier: Notifier;
  intervalSeconds: number;
  shiftHours: number;
  reminderLeadMinutes: number;
  notifyTimeoutMs: number;
}

let _activeInterval: NodeJS.Timeout | null = null;

/**
 * One locked tick with health bookkeeping. Never rejects.
 */
export async function runLockedTick(opts: LifecycleSchedulerOptions): Promise<TickSummary | null> {
  try {
    const summary = await withTickLock("lifecycle", () =>
      runTick({
        now: now(),
        notifier: opts.notifier,
        shiftHours: opts.shiftHours,
        reminderLeadMinutes: opts.reminderLeadMinutes,
        notifyTimeoutMs: opts.notifyTimeoutMs,
      })
    );
    recordSchedulerRun(SCHEDULER_NAME, summary.failures === 0);

    if (summary.expired + summary.reminded + summary.activated + summary.failures > 0) {
      logger.info(summary, "[lifecycle] tick completed");
    } else {
      logger.debug(summary, "[lifecycle] tick completed");
    }
    return summary;
  } catch (err) {
    recordSchedulerRun(SCHEDULER_NAME, false);
    logger.error({ err }, "[lifecycle] tick failed");
    return null;
  }
}

export function startTitleLifecycleScheduler(opts: LifecycleSchedulerOptions): void {
  // Opt-out for tests
  if (process.env.TITLE_SCHEDULER_DISABLED === "1") {
    logger.debug("[lifecycle] scheduler disabled via env flag");
    return;
  }
  if (_activeInterval) {
    logger.warn("[lifecycle] scheduler already running");
    return;
  }

  logger.info({ intervalSeconds: opts.intervalSeconds }, "[lifecycle] scheduler starting");

  void runLockedTick(opts);

  const interval = setInterval(() => {
    void runLockedTick(opts);
  }, opts.intervalSeconds * 1000);

  // Prevent interval from keeping process alive during shutdown
  interval.unref();

  _activeInterval = interval;
}

export function stopTitleLifecycleScheduler(): void {
  if (_activeInterval) {
    clearInterval(_activeInterval);
    _activeInterval = null;
    logger.info("[lifecycle] scheduler stopped");
  }
}
