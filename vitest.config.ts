import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: false,
    include: ["tests/**/*.test.ts"],
    testTimeout: 10000,
    env: {
      LOG_LEVEL: "silent",
    },
  },
});
