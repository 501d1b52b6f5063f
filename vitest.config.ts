import { configDefaults, defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    exclude: [...configDefaults.exclude, "bench/**"],
    coverage: {
      provider: "v8",
      include: ["src/**/*.ts"],
      exclude: ["src/index.ts", "src/s3/s3Types.ts"],
      thresholds: {
        statements: 85,
        branches: 75,
        functions: 95,
        lines: 90,
      },
    },
  },
});
