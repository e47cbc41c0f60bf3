import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/__tests__/**/*.test.ts"],
    environment: "node",
    // better-sqlite3 is a native add-on
    pool: "forks",
  },
});
