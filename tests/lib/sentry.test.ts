/**
 * Titlekeeper — tests/lib/sentry.test.ts
 * WHAT: The Sentry wrapper stays inert under Vitest and without a DSN.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi } from "vitest";

vi.mock("@sentry/node", () => ({
  init: vi.fn(),
  captureException: vi.fn(() => "event-id"),
  addBreadcrumb: vi.fn(),
  setTag: vi.fn(),
  setContext: vi.fn(),
  close: vi.fn(async () => true),
  getClient: vi.fn(),
  consoleIntegration: vi.fn(),
  httpIntegration: vi.fn(),
  onUncaughtExceptionIntegration: vi.fn(),
  onUnhandledRejectionIntegration: vi.fn(),
}));

vi.mock("../../src/lib/logger.js", () => ({
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn(), fatal: vi.fn() },
}));

import * as Sentry from "@sentry/node";
import {
  addBreadcrumb,
  captureException,
  flushSentry,
  initializeSentry,
  isSentryEnabled,
  setTag,
} from "../../src/lib/sentry.js";

describe("sentry", () => {
  it("does not initialize under Vitest", () => {
    initializeSentry();
    expect(Sentry.init).not.toHaveBeenCalled();
    expect(isSentryEnabled()).toBe(false);
  });

  it("drops captures while disabled", () => {
    expect(captureException(new Error("boom"), { cmd: "schedule" })).toBeNull();
    expect(Sentry.captureException).not.toHaveBeenCalled();
  });

  it("drops breadcrumbs and tags while disabled", () => {
    addBreadcrumb({ message: "tick", category: "scheduler" });
    setTag("cmd", "titles");
    expect(Sentry.addBreadcrumb).not.toHaveBeenCalled();
    expect(Sentry.setTag).not.toHaveBeenCalled();
  });

  it("flushes as a no-op while disabled", async () => {
    await expect(flushSentry()).resolves.toBe(true);
    expect(Sentry.close).not.toHaveBeenCalled();
  });
});
