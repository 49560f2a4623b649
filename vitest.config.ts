import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["astro/**/__tests__/**/*.test.ts", "constitution/**/__tests__/**/*.test.ts"],
    testTimeout: 10_000,
  },
});
