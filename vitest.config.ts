import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts", "tests/**/*.test.ts"],
    exclude: ["tests/e2e/**"],
    coverage: {
      provider: "v8",
      reporter: ["text", "html", "json-summary"],
      reportsDirectory: "coverage",
      exclude: [
        "**/*.test.ts",
        "**/*.d.ts",
        // Barrel re-export files (no logic, just re-exports)
        "src/index.ts",
        "src/bitcoind/index.ts",
        "src/test/**",
      ],
    },
  },
});
