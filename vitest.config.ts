import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.spec.ts", "__tests__/**/*.spec.ts"],
    environment: "node",
    env: {
      LOG_LEVEL: "silent",
    },
  },
});
