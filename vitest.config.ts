import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "~": fileURLToPath(new URL("./src", import.meta.url)),
    },
  },
  test: {
    environment: "node",
    isolate: true,
    reporters: process.env.GITHUB_ACTIONS
      ? ["github-actions", "default"]
      : ["default"],
    include: ["src/__tests__/**/*.test.ts"],
    exclude: ["**/*.d.ts", "node_modules/**"],
    env: { NODE_ENV: "test" },
    coverage: {
      provider: "istanbul",
      reporter: ["text", "html", "json"],
      include: ["src/**/*.ts"],
      exclude: ["src/__tests__/**", "src/server.ts"],
      thresholds: { lines: 90, functions: 90, branches: 85, statements: 90 },
    },
  },
});
