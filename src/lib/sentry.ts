/**
 * Titlekeeper — src/lib/sentry.ts
 * WHAT: Sentry bootstrap and small helpers for capture/contexts.
 * FLOWS: initializeSentry() → isSentryEnabled → captureException/addBreadcrumb → flushSentry on shutdown
 * DOCS:
 *  - Sentry Node SDK: https://docs.sentry.io/platforms/javascript/guides/node/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import * as Sentry from "@sentry/node";
import {
  consoleIntegration,
  httpIntegration,
  onUncaughtExceptionIntegration,
  onUnhandledRejectionIntegration,
} from "@sentry/node";
import fs from "node:fs";
import path from "node:path";
import { env } from "./env.js";
import { logger } from "./logger.js";

let sentryEnabled = false;

const TOKEN_RE = /[A-Za-z0-9_-]{24}\.[A-Za-z0-9_-]{6}\.[A-Za-z0-9_-]{27}/g;

function hasValidDsn(dsn: string | undefined): dsn is string {
  // https://{key}@{org}.ingest.sentry.io/{project}; structure only, a bad key surfaces as a 403 later
  if (!dsn) return false;
  try {
    const parsed = new URL(dsn);
    return (
      (parsed.protocol === "https:" || parsed.protocol === "http:") &&
      parsed.username.length > 0 &&
      parsed.pathname.length > 1
    );
  } catch {
    return false;
  }
}

function getVersion(): string {
  try {
    const pkg: unknown = JSON.parse(fs.readFileSync(path.join(process.cwd(), "package.json"), "utf-8"));
    if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
      return pkg.version;
    }
  } catch (err) {
    logger.debug({ err }, "[sentry] package.json unreadable, release set to unknown");
  }
  return "unknown";
}

/**
 * Only activates with a structurally valid SENTRY_DSN, and never under Vitest.
 */
export function initializeSentry(): void {
  if (process.env.VITEST_WORKER_ID) return;

  if (!hasValidDsn(env.SENTRY_DSN)) {
    logger.info("[sentry] DSN missing or invalid, error tracking disabled");
    return;
  }

  try {
    Sentry.init({
      dsn: env.SENTRY_DSN,
      environment: env.SENTRY_ENVIRONMENT || env.NODE_ENV,
      release: `titlekeeper@${getVersion()}`,
      tracesSampleRate: env.SENTRY_TRACES_SAMPLE_RATE,
      integrations: [
        consoleIntegration({ levels: ["error", "warn"] }),
        httpIntegration(),
        onUncaughtExceptionIntegration({
          onFatalError: async (err: Error) => {
            logger.fatal({ err }, "[sentry] Uncaught exception detected");
            process.exit(1);
          },
        }),
        onUnhandledRejectionIntegration({ mode: "warn" }),
      ],

      beforeSend(event) {
        if (event.message) {
          event.message = event.message.replace(TOKEN_RE, "[REDACTED_TOKEN]");
        }
        const runtimeEnv = event.contexts?.runtime?.env;
        if (typeof runtimeEnv === "object" && runtimeEnv !== null) {
          for (const key of ["DISCORD_TOKEN", "SENTRY_DSN", "WEBHOOK_URL"]) {
            if (key in runtimeEnv) Reflect.set(runtimeEnv, key, "[REDACTED]");
          }
        }
        return event;
      },

      // Transient transport noise; logged separately with more context
      ignoreErrors: ["DiscordAPIError", "AbortError", "TimeoutError", "ECONNRESET", "ETIMEDOUT", "ENOTFOUND"],
    });

    sentryEnabled = true;
    logger.info({ environment: env.SENTRY_ENVIRONMENT || env.NODE_ENV }, "[sentry] initialized");

    // A revoked DSN answers 403; stop sending instead of retrying forever
    const client = Sentry.getClient();
    client?.on("afterSendEvent", (_event, response) => {
      if (response?.statusCode === 403) {
        logger.warn({ statusCode: 403 }, "[sentry] unauthorized; disabling capture");
        sentryEnabled = false;
        client.close(0).then(undefined, (err: unknown) => {
          logger.debug({ err }, "[sentry] close after 403 failed");
        });
      }
    });
  } catch (err) {
    logger.error({ err }, "[sentry] failed to initialize");
    sentryEnabled = false;
  }
}

export function isSentryEnabled(): boolean {
  return sentryEnabled;
}

export function captureException(error: unknown, context?: Record<string, unknown>): string | null {
  if (!sentryEnabled) return null;
  return Sentry.captureException(error, {
    contexts: context ? { custom: context } : undefined,
  });
}

export function addBreadcrumb(breadcrumb: {
  message: string;
  category?: string;
  level?: Sentry.SeverityLevel;
  data?: Record<string, unknown>;
}): void {
  if (!sentryEnabled) return;
  Sentry.addBreadcrumb(breadcrumb);
}

export function setTag(key: string, value: string): void {
  if (!sentryEnabled) return;
  Sentry.setTag(key, value);
}

export function setContext(name: string, context: Record<string, unknown>): void {
  if (!sentryEnabled) return;
  Sentry.setContext(name, context);
}

/**
 * Flush any pending events (use before shutdown)
 */
export async function flushSentry(timeout = 2000): Promise<boolean> {
  if (!sentryEnabled) return true;
  try {
    return await Sentry.close(timeout);
  } catch (err) {
    logger.error({ err }, "[sentry] failed to flush events");
    return false;
  }
}
