import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["test/**/*.test.ts"],
    setupFiles: ["test/setup/unit.ts"],
    env: {
      APP_MODE: "local",
      OPENAI_API_KEY: "test-key",
      OPENAI_MODEL: "gpt-4.1-mini",
      LOG_LEVEL: "error"
    },
    restoreMocks: true,
    clearMocks: true,
    unstubEnvs: true,
    fileParallelism: false,
    pool: "threads",
    poolOptions: {
      threads: {
        singleThread: true
      }
    },
    coverage: {
      provider: "v8",
      reporter: ["text", "json-summary"],
      include: ["src/**/*.ts"],
      exclude: ["src/**/types.ts", "src/scripts/**"]
    }
  }
});
