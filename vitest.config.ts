import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const src = (pkg: string) =>
  fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));

export default defineConfig({
  test: {
    environment: "node",
    include: ["packages/*/src/**/*.spec.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    testTimeout: 30000,
    clearMocks: true,
  },
  resolve: {
    // Workspace packages export dist/ at runtime; tests run against sources.
    alias: {
      "@hindsight/shared": src("shared"),
      "@hindsight/db": src("db"),
      "@hindsight/capture": src("capture"),
    },
  },
});
