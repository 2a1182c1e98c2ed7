import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    environment: "node",
    // Child processes, so a test may switch process.env.TZ.
    pool: "forks",
  },
});
