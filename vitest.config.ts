import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.{test,spec}.{js,ts}"],
    environment: "node",
    env: { LOG_LEVEL: "error" },
  },
});
