import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["services/*/test/**/*.test.ts"],
    environment: "node",
    env: {
      LOG_LEVEL: "silent",
      USE_INMEMORY_STORE: "true",
      SCANNER_ENABLED: "false"
    }
  }
});
