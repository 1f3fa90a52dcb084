import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: false,
    environment: "node",
    include: ["tests/**/*.test.ts"],
    exclude: ["**/node_modules/**"],
    env: {
      LOG_LEVEL: "silent",
      LOG_PRETTY: "false",
      LOG_DIR: "",
    },
  },
});
