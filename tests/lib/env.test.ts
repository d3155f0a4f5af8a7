/**
 * Titlekeeper — tests/lib/env.test.ts
 * WHAT: The real env module: defaults, coercion, blank-as-unset and fail-fast exit.
 * HOW: vi.stubEnv + vi.resetModules, then a fresh dynamic import per case.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

async function loadEnv() {
  const { env } = await import("../../src/lib/env.js");
  return env;
}

describe("env", () => {
  beforeEach(() => {
    vi.resetModules();
    vi.stubEnv("DISCORD_TOKEN", "test-token");
    vi.stubEnv("CLIENT_ID", "test-client");
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("applies the scheduling defaults", async () => {
    vi.stubEnv("SHIFT_HOURS", "");
    vi.stubEnv("REMINDER_LEAD_MINUTES", "");
    vi.stubEnv("TICK_INTERVAL_SECONDS", "");
    vi.stubEnv("NOTIFY_TIMEOUT_MS", "");
    vi.stubEnv("WEB_PORT", "");

    const env = await loadEnv();

    expect(env.SHIFT_HOURS).toBe(3);
    expect(env.REMINDER_LEAD_MINUTES).toBe(5);
    expect(env.TICK_INTERVAL_SECONDS).toBe(60);
    expect(env.NOTIFY_TIMEOUT_MS).toBe(10_000);
    expect(env.WEB_PORT).toBe(8080);
  });

  it("coerces numbers and trims values", async () => {
    vi.stubEnv("SHIFT_HOURS", " 4 ");
    vi.stubEnv("WEB_PORT", "0");
    vi.stubEnv("GUILD_ID", "  ");

    const env = await loadEnv();

    expect(env.SHIFT_HOURS).toBe(4);
    expect(env.WEB_PORT).toBe(0);
    expect(env.GUILD_ID).toBeUndefined();
  });

  describe("invalid configuration", () => {
    beforeEach(() => {
      vi.spyOn(console, "error").mockImplementation(() => undefined);
      vi.spyOn(process, "exit").mockImplementation((code) => {
        throw new Error(`process.exit(${String(code)})`);
      });
    });

    it("exits when the token is missing", async () => {
      vi.stubEnv("DISCORD_TOKEN", "");

      await expect(loadEnv()).rejects.toThrow("process.exit(1)");
      expect(console.error).toHaveBeenCalledWith(expect.stringContaining("- DISCORD_TOKEN: Required"));
    });

    it("rejects a notify timeout above fifteen seconds", async () => {
      vi.stubEnv("NOTIFY_TIMEOUT_MS", "20000");

      await expect(loadEnv()).rejects.toThrow("process.exit(1)");
      expect(console.error).toHaveBeenCalledWith(expect.stringContaining("- NOTIFY_TIMEOUT_MS:"));
    });

    it("rejects a malformed webhook URL", async () => {
      vi.stubEnv("WEBHOOK_URL", "not-a-url");

      await expect(loadEnv()).rejects.toThrow("process.exit(1)");
      expect(console.error).toHaveBeenCalledWith(
        expect.stringContaining("- WEBHOOK_URL: WEBHOOK_URL must be a URL")
      );
    });
  });
});
