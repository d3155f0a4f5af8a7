/**
 * Titlekeeper — src/lib/env.ts
 * WHAT: Environment loading/validation via dotenv + zod.
 * FLOWS: load .env → parse/validate → export typed env object
 * DOCS:
 *  - zod: https://zod.dev
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import dotenv from "dotenv";
import path from "node:path";
import { z } from "zod";
import {
  DEFAULT_NOTIFY_TIMEOUT_MS,
  DEFAULT_REMINDER_LEAD_MINUTES,
  DEFAULT_SHIFT_HOURS,
  DEFAULT_TICK_INTERVAL_SECONDS,
} from "./constants.js";

// .env is read from the working directory. Tests set their variables before
// import, so they must win over the file.
const isTest = process.env.NODE_ENV === "test" || process.env.VITEST !== undefined;
dotenv.config({ path: path.join(process.cwd(), ".env"), override: !isTest });

/**
 * Every variable is trimmed; blank values count as unset so defaults apply.
 */
function read(key: string): string | undefined {
  const value = process.env[key]?.trim();
  return value ? value : undefined;
}

const raw = {
  DISCORD_TOKEN: read("DISCORD_TOKEN"),
  CLIENT_ID: read("CLIENT_ID"),
  GUILD_ID: read("GUILD_ID"),
  NODE_ENV: read("NODE_ENV"),
  OWNER_IDS: read("OWNER_IDS"),

  DB_PATH: read("DB_PATH"),
  TITLES_CATALOG_PATH: read("TITLES_CATALOG_PATH"),
  AUDIT_CSV_PATH: read("AUDIT_CSV_PATH"),

  WEBHOOK_URL: read("WEBHOOK_URL"),
  ANNOUNCE_CHANNEL_ID: read("ANNOUNCE_CHANNEL_ID"),
  GUARDIAN_ROLE_ID: read("GUARDIAN_ROLE_ID"),
  TITLE_REQUESTS_CHANNEL_ID: read("TITLE_REQUESTS_CHANNEL_ID"),
  NOTIFY_TIMEOUT_MS: read("NOTIFY_TIMEOUT_MS"),

  SHIFT_HOURS: read("SHIFT_HOURS"),
  REMINDER_LEAD_MINUTES: read("REMINDER_LEAD_MINUTES"),
  TICK_INTERVAL_SECONDS: read("TICK_INTERVAL_SECONDS"),

  WEB_PORT: read("WEB_PORT"),

  SENTRY_DSN: read("SENTRY_DSN"),
  SENTRY_ENVIRONMENT: read("SENTRY_ENVIRONMENT"),
  SENTRY_TRACES_SAMPLE_RATE: read("SENTRY_TRACES_SAMPLE_RATE"),
  LOG_LEVEL: read("LOG_LEVEL"),
};

const schema = z.object({
  // Core Discord credentials - bot won't start without these
  DISCORD_TOKEN: z.string().min(1, "Missing DISCORD_TOKEN"),
  CLIENT_ID: z.string().min(1, "Missing CLIENT_ID"),
  GUILD_ID: z.string().optional(),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  // Comma-separated user IDs with the privileged override
  OWNER_IDS: z.string().optional(),

  DB_PATH: z.string().default("data/titles.db"),
  TITLES_CATALOG_PATH: z.string().default("config/titles.json"),
  AUDIT_CSV_PATH: z.string().default("data/requests.csv"),

  WEBHOOK_URL: z.string().url("WEBHOOK_URL must be a URL").optional(),
  ANNOUNCE_CHANNEL_ID: z.string().optional(),
  GUARDIAN_ROLE_ID: z.string().optional(),
  TITLE_REQUESTS_CHANNEL_ID: z.string().optional(),
  NOTIFY_TIMEOUT_MS: z.coerce.number().int().min(1000).max(15000).default(DEFAULT_NOTIFY_TIMEOUT_MS),

  SHIFT_HOURS: z.coerce.number().positive().max(24).default(DEFAULT_SHIFT_HOURS),
  REMINDER_LEAD_MINUTES: z.coerce.number().int().min(0).max(24 * 60).default(DEFAULT_REMINDER_LEAD_MINUTES),
  TICK_INTERVAL_SECONDS: z.coerce.number().int().min(5).max(3600).default(DEFAULT_TICK_INTERVAL_SECONDS),

  // 0 disables the web surface
  WEB_PORT: z.coerce.number().int().min(0).max(65535).default(8080),

  SENTRY_DSN: z.string().optional(),
  SENTRY_ENVIRONMENT: z.string().optional(),
  SENTRY_TRACES_SAMPLE_RATE: z.coerce.number().min(0).max(1).default(0.1),
  LOG_LEVEL: z.string().optional(),
});

export type Env = z.infer<typeof schema>;

/**
 * Fail-fast validation. safeParse reports every problem at once.
 */
const parsed = schema.safeParse(raw);
if (!parsed.success) {
  const issues = parsed.error.issues.map((i) => `- ${i.path.join(".")}: ${i.message}`).join("\n");
  console.error(`Environment validation failed:\n${issues}`);
  process.exit(1);
}
export const env: Env = parsed.data;
