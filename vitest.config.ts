import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["**/__tests__/**/*.test.ts"],
    exclude: ["node_modules/**", "dist/**"],
    environment: "node",
    env: {
      NATAL_LOG_LEVEL: "silent",
    },
  },
});
