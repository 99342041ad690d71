import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/*.test.ts"],
    env: {
      DB_PATH: ":memory:",
      SCRAPER_DELAY_MS: "0",
    },
  },
});
