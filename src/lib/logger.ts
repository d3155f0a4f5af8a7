/**
 * Titlekeeper — src/lib/logger.ts
 * WHAT: Pino logger with light redaction and Sentry capture on error-level logs.
 * FLOWS: create logger → redact helpers → hook to captureException on error logs
 * DOCS:
 *  - pino: https://getpino.io/#/docs/api
 *  - Sentry Node SDK: https://docs.sentry.io/platforms/javascript/guides/node/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import pino from "pino";

/**
 * Token pattern: Discord bot tokens are 3 base64-ish segments separated by dots.
 * DSN pattern: Sentry DSNs embed auth tokens in URLs. Keep the host, drop the secret.
 * Mention pattern: @everyone/@here in an IGN or coords field should never reach a log verbatim.
 */
const tokenRe = /[A-Za-z0-9_-]{24}\.[A-Za-z0-9_-]{6}\.[A-Za-z0-9_-]{27}/g;
const dsnRe = /(https?:\/\/)([^:@]+):[^@]+@/gi;
const mentionRe = /@(everyone|here)/gi;

let sentryImportWarned = false;

/**
 * Sanitizes strings before logging. Use on any user-controlled or external data
 * (IGNs, coordinates, form bodies). Truncates at 300 chars.
 */
export function redact(value: string): string {
  if (!value) return "";
  let sanitized = value.replace(/\s+/g, " ").trim();
  sanitized = sanitized.replace(tokenRe, "[redacted_token]");
  sanitized = sanitized.replace(dsnRe, "$1$2:[redacted]@");
  sanitized = sanitized.replace(mentionRe, "@redacted");
  if (sanitized.length > 300) {
    sanitized = `${sanitized.slice(0, 300)}...`;
  }
  return sanitized;
}

const logLevel = process.env.LOG_LEVEL ?? "info";
const isVitest = !!process.env.VITEST_WORKER_ID;
const wantPretty = isVitest || (process.env.LOG_PRETTY === "true" && process.stdout.isTTY);

function serializeErr(e: unknown) {
  if (!(e instanceof Error)) return e;
  return {
    name: e.name,
    code: "code" in e ? e.code : undefined,
    message: e.message,
    stack: e.stack,
    cause: e.cause instanceof Error ? e.cause.message : undefined,
  };
}

export const logger = pino({
  level: logLevel,
  ...(wantPretty
    ? {
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "HH:MM:ss.l",
            ignore: "pid,hostname",
            singleLine: false,
          },
        },
      }
    : {}),
  base: undefined,
  serializers: {
    err: serializeErr,
  },
  /**
   * Error-level logs that carry an Error (first arg, or `{ err }`) are forwarded
   * to Sentry, so call sites only need logger.error().
   */
  hooks: {
    logMethod(args, method, level) {
      if (level >= pino.levels.values.error) {
        const firstArg: unknown = args[0];
        const errorCandidate =
          firstArg instanceof Error
            ? firstArg
            : typeof firstArg === "object" && firstArg !== null && "err" in firstArg
              ? firstArg.err
              : undefined;

        if (errorCandidate instanceof Error) {
          const message = typeof args[1] === "string" ? args[1] : undefined;
          const label = pino.levels.labels[level] ?? "error";

          // Dynamic import keeps Sentry optional and avoids a logger <-> sentry cycle
          import("./sentry.js")
            .then(({ captureException, isSentryEnabled }) => {
              if (isSentryEnabled()) {
                captureException(errorCandidate, { message, level: label });
              }
            })
            .catch((importErr: unknown) => {
              if (!sentryImportWarned) {
                sentryImportWarned = true;
                console.warn(
                  "[logger] Failed to import Sentry module:",
                  importErr instanceof Error ? importErr.message : importErr
                );
              }
            });
        }
      }

      return method.apply(this, args);
    },
  },
});
