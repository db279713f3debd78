import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

export default defineConfig({
  resolve: {
    alias: {
      "@shared/schema": fileURLToPath(new URL("./packages/shared/schema", import.meta.url)),
      "@shared": fileURLToPath(new URL("./packages/shared", import.meta.url)),
    },
  },
  test: {
    globals: true,
    environment: "node",
    include: ["**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    coverage: {
      provider: "v8",
      reporter: ["text", "json-summary", "html"],
      include: ["server/**/*.ts", "packages/shared/**/*.ts"],
      exclude: [
        "**/node_modules/**",
        "**/*.test.ts",
        "**/*.d.ts",
        // Pure interface/type-alias files compile to empty JS
        "**/types.ts",
        // Entry point, exercised by running the server
        "server/index.ts",
        "server/__tests__/helpers/**",
      ],
    },
    testTimeout: 10000,
  },
});
