import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["tests/**/*.test.ts"],
    setupFiles: ["tests/setup.ts"],
    restoreMocks: true,
    clearMocks: true,
    unstubGlobals: true,

    // Drop dotenv banners; keep everything else
    onConsoleLog(log: string) {
      if (/\[dotenv@/i.test(log) || /injecting env/i.test(log) || /tip:/i.test(log)) {
        return false;
      }
      return true;
    },
  },
});
