import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["apps/*/src/**/*.test.ts", "packages/*/src/**/*.test.ts"],
    exclude: ["node_modules", "dist"],
    pool: "forks",
    env: {
      NODE_ENV: "test",
      DATABASE_URL: ":memory:",
      SESSION_SECRET: "test-secret-test-secret",
      BCRYPT_ROUNDS: "4",
      LOG_LEVEL: "silent"
    }
  }
});
