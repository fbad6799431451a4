import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["tests/**/*.test.ts"],
    // jsdom + sharp make the first import slow on cold caches
    testTimeout: 20000,
  },
});
