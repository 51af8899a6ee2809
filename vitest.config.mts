import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["backend/tests/**/*.test.ts", "services/runner/tests/**/*.test.ts"],
    globals: true,
    // Judge and storage are injected per test; nothing here may reach the network or Postgres.
    env: {
      NODE_ENV: "test",
      DEBUG: "false",
      JUDGE_API_KEY: ""
    }
  }
});
