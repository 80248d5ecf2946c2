import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["packages/*/tests/**/*.test.ts"],
    testTimeout: 15_000,
    env: {
      NODE_ENV: "test",
      LOG_LEVEL: "silent"
    }
  }
});
