import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["bot/tests/**/*.spec.ts"],
    environment: "node",
    env: {
      NODE_ENV: "test",
      LOG_LEVEL: "silent",
    },
  },
});
