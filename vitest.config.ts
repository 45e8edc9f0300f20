import { defineConfig } from "vitest/config";

const isCI = process.env.CI === "true" || process.env.GITHUB_ACTIONS === "true";

export default defineConfig({
  test: {
    testTimeout: 30_000,
    pool: "forks",
    maxWorkers: isCI ? 2 : 4,
    include: ["src/**/*.test.ts"],
    setupFiles: ["test/setup.ts"],
    exclude: ["dist/**", "**/node_modules/**"],
    coverage: {
      provider: "v8",
      reporter: ["text", "lcov"],
      include: ["src/**/*.ts"],
      exclude: [
        "src/**/*.test.ts",
        // Entrypoints and wiring (covered by the cli tests).
        "src/entry.ts",
        "src/index.ts",
      ],
    },
  },
});
