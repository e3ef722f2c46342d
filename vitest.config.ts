import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    environment: "node",
    env: {
      ASSETLINE_LOG_LEVEL: "silent"
    },
    testTimeout: 20000
  }
});
