// vitest.config.ts
// Configuration for vitest test runner

import { defineConfig } from "vitest/config";
import { loadEnv } from "vite";

export default defineConfig(({ mode }) => {
  // Only SODG_* variables from .env files reach the tests
  const env = loadEnv(mode, process.cwd(), "SODG_");

  return {
    test: {
      env,
      testTimeout: 20_000,
      pool: "threads",
      include: ["test/**/*.spec.ts"],
    },
  };
});
