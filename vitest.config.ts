import { defineConfig } from "vitest/config";

// Timestamps are rendered in local time; pin it so expectations are stable.
process.env["TZ"] = "UTC";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    environment: "node",
    env: {
      TZ: "UTC",
    },
  },
});
