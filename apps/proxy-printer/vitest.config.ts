import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "unit",
    include: ["src/**/*.test.ts"],
    environment: "node",
    setupFiles: ["src/__tests__/setup.units.ts"],
  },
});
