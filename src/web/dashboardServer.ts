/**
 * Titlekeeper — src/web/dashboardServer.ts
 * WHAT: HTTP surface for the dashboard and the public booking form.
 * FLOWS:
 *  - GET  /api/dashboard → statuses + 7-day schedule grid data + requestable titles
 *  - POST /api/book      → non-privileged submitBooking (JSON or url-encoded)
 *  - GET  /health        → scheduler health + tick lock depth
 * routeRequest() is transport-free; startDashboardServer() adapts it to node:http.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import http from "node:http";
import { z } from "zod";
import { findCatalogEntry } from "../config/catalog.js";
import { describeBookingResult, submitBooking, type BookingResult } from "../features/bookingRequest.js";
import type { Notifier } from "../features/notifier.js";
import { listUpcoming } from "../features/reservations.js";
import { SCHEDULE_HORIZON_DAYS } from "../lib/constants.js";
import { ParseError, classifyError, errorContext } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { getSchedulerHealth, isSchedulerDegraded } from "../lib/schedulerHealth.js";
import { tickLockDepth } from "../lib/tickLock.js";
import { slotKey, slotKeyFromParts } from "../lib/time.js";
import { getAllStatuses, getCatalog } from "../store/titleStore.js";

const MAX_BODY_BYTES = 16 * 1024;

export interface WebDeps {
  now: () => Date;
  shiftHours: number;
  auditPath: string;
  notifyTimeoutMs: number;
  getNotifier: () => Notifier;
}

export interface RouteResponse {
  status: number;
  body: unknown;
}

const bookingSchema = z.object({
  title: z.string().trim().min(1, "title is required"),
  ign: z.string().trim().min(1, "ign is required"),
  coords: z.string().trim().default(""),
  date: z.string().trim().min(1, "date is required"),
  time: z.string().trim().min(1, "time is required"),
});

// ===== Handlers =====

/**
 * "degraded" once any scheduler has failed several ticks in a row. Timestamps
 * are epoch ms, null until the first run.
 */
function buildHealth(): RouteResponse {
  const schedulers = getSchedulerHealth();
  return {
    status: 200,
    body: {
      status: schedulers.some(isSchedulerDegraded) ? "degraded" : "ok",
      tickLockDepth: tickLockDepth(),
      schedulers,
    },
  };
}

function buildDashboard(deps: WebDeps): RouteResponse {
  const at = deps.now();
  const catalog = getCatalog();

  const titles = getAllStatuses().map((status) => {
    const entry = catalog.find((e) => e.name === status.name);
    const holder = status.holder;
    return {
      name: status.name,
      effects: entry?.effects ?? "",
      icon: entry?.iconFile ?? null,
      requestable: entry?.requestable ?? false,
      holder: holder
        ? { ign: holder.ign, coords: holder.coords, claimedAt: holder.claimedAt.toISOString(), expiresAt: holder.expiresAt.toISOString() }
        : null,
      remainingSeconds: holder
        ? Math.max(0, Math.floor((holder.expiresAt.getTime() - at.getTime()) / 1000))
        : null,
    };
  });

  const today = Date.UTC(at.getUTCFullYear(), at.getUTCMonth(), at.getUTCDate());
  const days = Array.from({ length: SCHEDULE_HORIZON_DAYS }, (_, i) =>
    new Date(today + i * 86_400_000).toISOString().slice(0, 10)
  );
  const step = Math.max(1, Math.floor(deps.shiftHours));
  const hours: string[] = [];
  for (let h = 0; h < 24; h += step) {
    hours.push(`${String(h).padStart(2, "0")}:00`);
  }

  const schedules = listUpcoming(at, SCHEDULE_HORIZON_DAYS, deps.shiftHours).map((r) => ({
    title: r.titleName,
    slotKey: r.slotKey,
    ign: r.reserverIgn,
    endsAt: r.shiftEnd.toISOString(),
  }));

  return {
    status: 200,
    body: {
      generatedAt: at.toISOString(),
      currentSlot: slotKey(at),
      shiftHours: deps.shiftHours,
      titles,
      days,
      hours,
      schedules,
      requestableTitles: catalog.filter((e) => e.requestable).map((e) => e.name),
    },
  };
}

function parseFormBody(body: string): unknown {
  const trimmed = body.trim();
  if (trimmed.startsWith("{")) {
    return JSON.parse(trimmed);
  }
  return Object.fromEntries(new URLSearchParams(trimmed));
}

function bookingStatus(result: BookingResult): number {
  switch (result.kind) {
    case "booked":
      return 201;
    case "slot_taken":
    case "conflicting_booking":
      return 409;
    case "unknown_title":
      return 404;
    case "not_requestable":
      return 403;
    case "invalid_ign":
    case "invalid_input":
    case "past_slot":
      return 400;
  }
}

async function handleBooking(rawBody: string, deps: WebDeps): Promise<RouteResponse> {
  let raw: unknown;
  try {
    raw = parseFormBody(rawBody);
  } catch {
    return { status: 400, body: { error: "Body must be JSON or form-encoded." } };
  }

  const parsed = bookingSchema.safeParse(raw);
  if (!parsed.success) {
    return { status: 400, body: { error: parsed.error.issues.map((i) => i.message).join("; ") } };
  }
  const form = parsed.data;

  const entry = findCatalogEntry(getCatalog(), form.title);
  if (!entry) {
    return { status: 404, body: { error: `Unknown title "${form.title}".` } };
  }

  let slot: string;
  try {
    slot = slotKeyFromParts(form.date, form.time);
  } catch (err) {
    if (err instanceof ParseError) {
      return { status: 400, body: { error: err.message } };
    }
    throw err;
  }

  const result = await submitBooking(
    {
      titleName: entry.name,
      ign: form.ign,
      coords: form.coords,
      slotKey: slot,
      submittedBy: "web",
      privileged: false,
    },
    {
      now: deps.now(),
      shiftHours: deps.shiftHours,
      auditPath: deps.auditPath,
      notifier: deps.getNotifier(),
      notifyTimeoutMs: deps.notifyTimeoutMs,
    }
  );

  const message = describeBookingResult(result, entry.name, slot);
  const status = bookingStatus(result);
  return status === 201
    ? { status, body: { result: result.kind, title: entry.name, slotKey: slot, message } }
    : { status, body: { result: result.kind, error: message } };
}

// ===== Router =====

export async function routeRequest(
  method: string,
  path: string,
  body: string,
  deps: WebDeps
): Promise<RouteResponse> {
  const pathname = new URL(path, "http://localhost").pathname;

  try {
    if (pathname === "/health") {
      return method === "GET" ? buildHealth() : { status: 405, body: { error: "Method not allowed" } };
    }
    if (pathname === "/api/dashboard") {
      return method === "GET" ? buildDashboard(deps) : { status: 405, body: { error: "Method not allowed" } };
    }
    if (pathname === "/api/book") {
      return method === "POST"
        ? await handleBooking(body, deps)
        : { status: 405, body: { error: "Method not allowed" } };
    }
    return { status: 404, body: { error: "Not found" } };
  } catch (err) {
    const classified = classifyError(err);
    logger.error({ err, method, pathname, ...errorContext(classified) }, "[web] request failed");
    return { status: 500, body: { error: "Internal error" } };
  }
}

// ===== Transport =====

function readBody(req: http.IncomingMessage): Promise<string | null> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    req.on("data", (chunk: Buffer) => {
      size += chunk.length;
      // Keep draining so the 413 can still be written
      if (size <= MAX_BODY_BYTES) chunks.push(chunk);
    });
    req.on("end", () => resolve(size > MAX_BODY_BYTES ? null : Buffer.concat(chunks).toString("utf-8")));
    req.on("error", reject);
  });
}

function send(res: http.ServerResponse, response: RouteResponse): void {
  res.writeHead(response.status, {
    "Content-Type": "application/json",
    "Cache-Control": "no-cache, max-age=0",
  });
  res.end(JSON.stringify(response.body));
}

export function startDashboardServer(port: number, deps: WebDeps): http.Server {
  const server = http.createServer((req, res) => {
    const method = req.method ?? "GET";
    const url = req.url ?? "/";

    readBody(req)
      .then(async (body) => {
        if (body === null) {
          send(res, { status: 413, body: { error: "Body too large" } });
          return;
        }
        const response = await routeRequest(method, url, body, deps);
        logger.debug({ method, url, status: response.status }, "[web] request");
        send(res, response);
      })
      .catch((err: unknown) => {
        logger.warn({ err, method, url }, "[web] failed to read request");
        if (!res.headersSent) send(res, { status: 400, body: { error: "Bad request" } });
      });
  });

  server.listen(port, () => {
    logger.info({ port }, "[web] dashboard server started");
  });

  server.on("error", (err) => {
    logger.error({ err, port }, "[web] dashboard server error");
  });

  return server;
}
