import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    environment: "node",
    // git round trips spawn real processes
    testTimeout: 30000,
  },
});
