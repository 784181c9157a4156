import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    setupFiles: ["test/setup.ts"],
    environment: "node",
    env: {
      TZ: "UTC",
    },
  },
});
