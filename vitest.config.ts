import { config as loadDotEnv } from "dotenv";
import { resolve } from "node:path";
import { defineConfig } from "vitest/config";

loadDotEnv({ path: resolve(process.cwd(), ".env.local"), override: false, quiet: true });

export default defineConfig({
  test: {
    testTimeout: 30_000,
    hookTimeout: 30_000,
    include: ["src/**/*.test.ts"],
    exclude: ["dist/**", "**/node_modules/**"],
    env: {
      RELAY_LOG_LEVEL: "silent",
      NO_COLOR: "1",
    },
  },
});
