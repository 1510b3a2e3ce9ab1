import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

function source(pkg: string): string {
  return fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));
}

export default defineConfig({
  resolve: {
    alias: {
      "@sigparse/sdk": source("sdk"),
      "@sigparse/shared": source("shared"),
      "@sigparse/docstring": source("docstring"),
      "@sigparse/core": source("core"),
    },
  },
  test: {
    include: ["packages/*/src/**/*.test.ts", "packages/*/__tests__/**/*.test.ts"],
    environment: "node",
    globals: false,
    testTimeout: 10000,
  },
});
