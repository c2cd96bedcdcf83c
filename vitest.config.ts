import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["interfaces/*/test/**/*.test.ts", "services/*/test/**/*.test.ts"],
    env: {
      LOG_LEVEL: "silent",
      USE_INMEMORY_STORE: "true"
    }
  }
});
