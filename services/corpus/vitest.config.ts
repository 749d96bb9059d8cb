import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@corpus-prep/common/tracing": fileURLToPath(
        new URL("../../packages/common/src/tracing.ts", import.meta.url),
      ),
    },
  },
  test: {
    globals: true,
    environment: "node",
    exclude: ["**/node_modules/**", "**/dist/**"],
    coverage: {
      provider: "v8",
      reporter: ["lcov", "text"],
      include: ["src/**/*.ts"],
      exclude: [
        "src/**/__tests__/**",
        "src/**/*.test.ts",
        "src/index.ts",
        "src/**/types.ts",
        "src/extractors/index.ts",
        "src/pipeline/index.ts",
        "src/sources/index.ts",
      ],
      reportsDirectory: "./coverage",
    },
  },
});
