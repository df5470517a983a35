import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["packages/**/*.spec.ts"],
    reporters: "default",
    coverage: {
      provider: "v8",
      all: false,
      reporter: ["text", "json", "html"],
      exclude: ["**/*.d.ts", "**/dist/**", "**/test/**", "**/*.spec.*"],
    },
  },
});
