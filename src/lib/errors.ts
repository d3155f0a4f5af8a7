/**
 * Titlekeeper — src/lib/errors.ts
 * WHAT: Thrown error classes for the scheduling core, plus a discriminated union
 *       classifier for anything that reaches a catch block.
 * FLOWS:
 *  - ParseError / StorageError / NotifierError are thrown by the core
 *  - classifyError(err) → ClassifiedError union type
 *  - shouldReportToSentry(err) → boolean (filter noise)
 * USAGE:
 *  import { classifyError, errorContext } from "./errors.js";
 *  const classified = classifyError(err);
 *  if (classified.kind === "storage_error") { ... }
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

// ===== Thrown errors =====

/**
 * Malformed timestamp or user input. Recoverable: reject the request with the message.
 */
export class ParseError extends Error {
  readonly input: string;

  constructor(message: string, input: string) {
    super(message);
    this.name = "ParseError";
    this.input = input;
  }
}

/**
 * Any storage failure other than the expected "slot taken" outcome.
 *
 * Fatal for the operation in progress. The store never retries; the caller
 * decides (the lifecycle tick logs it and moves on to the next title/slot).
 */
export class StorageError extends Error {
  readonly operation: string;
  /** SQLite result code when the driver gave one (SQLITE_BUSY, SQLITE_IOERR, ...) */
  readonly code: string | undefined;

  constructor(operation: string, cause: unknown) {
    super(`${operation} failed: ${describeCause(cause)}`, { cause });
    this.name = "StorageError";
    this.operation = operation;
    const code = readProp(cause, "code");
    this.code = typeof code === "string" ? code : undefined;
  }
}

/**
 * A notification that failed or timed out. Always non-fatal.
 */
export class NotifierError extends Error {
  readonly transport: string;

  constructor(transport: string, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "NotifierError";
    this.transport = transport;
  }
}

// ===== Classification =====

export interface AppError {
  kind: string;
  message: string;
  cause?: Error;
}

export interface ParseFailure extends AppError {
  kind: "parse_error";
  input: string;
}

export interface StorageFailure extends AppError {
  kind: "storage_error";
  operation: string;
  code?: string;
}

export interface NotifierFailure extends AppError {
  kind: "notifier_error";
  transport: string;
}

/**
 * Raw SQLite errors that escaped the store wrapper (schema bootstrap, shutdown).
 */
export interface DbError extends AppError {
  kind: "db_error";
  code: string;
}

/**
 * Discord API errors. Discord uses numeric codes (not HTTP status):
 * - 10062: Unknown Interaction (3s window expired)
 * - 40060: Already acknowledged
 * - 50013: Missing Permissions
 * - 50001: Missing Access
 */
export interface DiscordApiError extends AppError {
  kind: "discord_api";
  code: number;
  httpStatus?: number;
}

export interface NetworkError extends AppError {
  kind: "network";
  code: string;
}

export interface UnknownError extends AppError {
  kind: "unknown";
}

export type ClassifiedError =
  | ParseFailure
  | StorageFailure
  | NotifierFailure
  | DbError
  | DiscordApiError
  | NetworkError
  | UnknownError;

const NETWORK_CODES = ["ECONNRESET", "ETIMEDOUT", "ENOTFOUND", "ECONNREFUSED", "EPIPE", "EAI_AGAIN"];

/**
 * Classify any caught value. Ordered from most specific to least: our own
 * classes first, then SQLite, Discord and libuv network markers.
 */
export function classifyError(err: unknown): ClassifiedError {
  if (err === null || err === undefined) {
    return { kind: "unknown", message: "Unknown error (null/undefined)" };
  }

  const cause = err instanceof Error ? err : undefined;
  const message = err instanceof Error ? err.message : String(err);

  if (err instanceof ParseError) {
    return { kind: "parse_error", message, input: err.input, cause };
  }
  if (err instanceof StorageError) {
    return { kind: "storage_error", message, operation: err.operation, code: err.code, cause };
  }
  if (err instanceof NotifierError) {
    return { kind: "notifier_error", message, transport: err.transport, cause };
  }

  const code = readProp(err, "code");
  const name = readProp(err, "name");

  if (name === "SqliteError" || (typeof code === "string" && code.startsWith("SQLITE_"))) {
    return { kind: "db_error", code: typeof code === "string" ? code : "UNKNOWN", message, cause };
  }

  if (typeof code === "number" && (name === "DiscordAPIError" || (typeof name === "string" && name.includes("Discord")))) {
    const status = readProp(err, "status") ?? readProp(err, "httpStatus");
    return {
      kind: "discord_api",
      code,
      httpStatus: typeof status === "number" ? status : undefined,
      message,
      cause,
    };
  }

  if (typeof code === "string" && NETWORK_CODES.includes(code)) {
    return { kind: "network", code, message, cause };
  }

  return { kind: "unknown", message, cause };
}

/**
 * Sentry should hear about things that are actually broken, not user typos or
 * Discord's expected interaction races.
 */
export function shouldReportToSentry(err: ClassifiedError): boolean {
  switch (err.kind) {
    case "discord_api":
      // 10062 expired, 40060 double-ack, 10008 unknown message, 50013 missing perms
      return ![10062, 40060, 10008, 50013].includes(err.code);
    case "parse_error":
    case "notifier_error":
    case "network":
      return false;
    default:
      return true;
  }
}

/**
 * Structured log fields for a classified error.
 */
export function errorContext(
  err: ClassifiedError,
  extra: Record<string, unknown> = {}
): Record<string, unknown> {
  const base = { errorKind: err.kind, errorMessage: err.message, ...extra };

  switch (err.kind) {
    case "storage_error":
      return { ...base, operation: err.operation, sqlCode: err.code };
    case "db_error":
      return { ...base, sqlCode: err.code };
    case "discord_api":
      return { ...base, discordCode: err.code, httpStatus: err.httpStatus };
    case "network":
      return { ...base, networkCode: err.code };
    case "notifier_error":
      return { ...base, transport: err.transport };
    default:
      return base;
  }
}

export function userFriendlyMessage(err: ClassifiedError): string {
  switch (err.kind) {
    case "parse_error":
      return err.message;
    case "storage_error":
    case "db_error":
      return "The title database is unavailable right now. Please try again shortly.";
    case "discord_api":
      if (err.code === 10062) return "This interaction has expired. Please run the command again.";
      if (err.code === 50013) return "I don't have permission to do that.";
      return "Discord API error occurred.";
    case "network":
    case "notifier_error":
      return "Network error. Please try again.";
    default:
      return "An unexpected error occurred.";
  }
}

// ===== Internal helpers =====

function readProp(value: unknown, key: string): unknown {
  if (typeof value !== "object" || value === null || !(key in value)) return undefined;
  return Reflect.get(value, key);
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}
