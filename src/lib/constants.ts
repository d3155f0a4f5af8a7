/**
 * Titlekeeper — src/lib/constants.ts
 * WHAT: Centralized constants for shift timing, timeouts and Discord limits.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { MessageMentionOptions } from "discord.js";

// ===== Discord =====

/**
 * Only the guardian role may be pinged by notifications; user-typed IGNs never ping anyone.
 */
export function notificationMentions(roleId: string | undefined): MessageMentionOptions {
  return roleId ? { parse: [], roles: [roleId] } : { parse: [] };
}

/** Discord command sync rate limit buffer (keeps us under 2 req/sec) */
export const DISCORD_COMMAND_SYNC_DELAY_MS = 650;

/** Grace period before exit on uncaught exception (for Sentry flush) */
export const UNCAUGHT_EXCEPTION_EXIT_DELAY_MS = 1000;

/** Embed accent used by every title notification */
export const TITLE_EMBED_COLOR = 0x58b9ff;

// ===== Shift lifecycle defaults (overridable through env) =====

export const DEFAULT_SHIFT_HOURS = 3;
export const DEFAULT_REMINDER_LEAD_MINUTES = 5;
export const DEFAULT_TICK_INTERVAL_SECONDS = 60;
export const DEFAULT_NOTIFY_TIMEOUT_MS = 10_000;

/** Coordinates and Discord id recorded for holders promoted from a reservation */
export const AUTO_ACTIVATION_COORDS = "-";
export const AUTO_ACTIVATION_DISCORD_ID = "0";

// ===== Input limits =====

export const MAX_IGN_LENGTH = 32;
export const MAX_COORDS_LENGTH = 32;

/** Days of schedule shown by /titles and the dashboard API */
export const SCHEDULE_HORIZON_DAYS = 7;
