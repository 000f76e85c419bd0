import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "shared",
    coverage: {
      provider: "v8",
      reporter: ["text", "json-summary", "json"],
      reportsDirectory: "./coverage",
      include: ["src/**/*.ts"],
      exclude: ["src/__tests__/**"],
    },
  },
});
