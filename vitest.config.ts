import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/__tests__/**/*.test.ts"],
    // Scheduler tests sleep on real timers
    testTimeout: 10000,
  },
});
