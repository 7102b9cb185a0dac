import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["src/**/*.spec.ts"],
    coverage: {
      exclude: [
        "database/**/*",
        ".config/**/*",
        "*.config.ts",
        "src/index.ts",
        "src/workers/**/*",
      ],
    },
  },
});
