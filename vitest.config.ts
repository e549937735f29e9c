import { defineConfig } from "vitest/config";

export default defineConfig({
  // Tests must not pick up a local `.env` with real credentials.
  envDir: ".vitest-env",
  test: {
    globals: true,
    // Threads avoid forking child processes in restricted sandboxes.
    pool: "threads",
    include: ["packages/**/src/**/*.test.ts"],
  },
});
