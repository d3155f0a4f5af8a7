/**
 * Titlekeeper — src/lib/schedulerHealth.ts
 * WHAT: Health tracking for scheduled background tasks (the title lifecycle tick).
 * FLOWS:
 *  - recordSchedulerRun(name, success) → update health state → alert if threshold exceeded
 *  - getSchedulerHealth() → every tracked scheduler, served in the GET /health body
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "./logger.js";

export interface SchedulerHealth {
  name: string;
  /** Epoch ms of last run attempt, null if never run */
  lastRunAt: number | null;
  lastSuccessAt: number | null;
  lastErrorAt: number | null;
  /** Failures since the last success */
  consecutiveFailures: number;
  totalRuns: number;
  totalFailures: number;
}

const CONSECUTIVE_FAILURE_ALERT_THRESHOLD = 3;

const schedulerHealth = new Map<string, SchedulerHealth>();

/**
 * @example
 * try {
 *   await runTick(...);
 *   recordSchedulerRun("titleLifecycle", true);
 * } catch (err) {
 *   recordSchedulerRun("titleLifecycle", false);
 * }
 */
export function recordSchedulerRun(name: string, success: boolean): void {
  const now = Date.now();
  const health: SchedulerHealth = schedulerHealth.get(name) ?? {
    name,
    lastRunAt: null,
    lastSuccessAt: null,
    lastErrorAt: null,
    consecutiveFailures: 0,
    totalRuns: 0,
    totalFailures: 0,
  };

  health.lastRunAt = now;
  health.totalRuns++;

  if (success) {
    health.lastSuccessAt = now;
    health.consecutiveFailures = 0;
  } else {
    health.lastErrorAt = now;
    health.consecutiveFailures++;
    health.totalFailures++;
  }

  schedulerHealth.set(name, health);

  if (isSchedulerDegraded(health)) {
    logger.error(
      {
        scheduler: name,
        consecutiveFailures: health.consecutiveFailures,
        totalFailures: health.totalFailures,
        totalRuns: health.totalRuns,
      },
      "[scheduler] Multiple consecutive failures - requires attention"
    );
  }
}

/**
 * Copies of every tracked scheduler, ordered by name.
 */
export function getSchedulerHealth(): SchedulerHealth[] {
  return Array.from(schedulerHealth.values(), (health) => ({ ...health })).sort((a, b) =>
    a.name.localeCompare(b.name)
  );
}

export function isSchedulerDegraded(health: SchedulerHealth): boolean {
  return health.consecutiveFailures >= CONSECUTIVE_FAILURE_ALERT_THRESHOLD;
}

/** Test-only reset */
export function _clearAllSchedulerHealth(): void {
  schedulerHealth.clear();
}
