import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/tests/src/**/*.test.ts"],
  },
});
