import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/*/src/**/*.test.ts", "packages/*/test/**/*.test.ts", "admin/src/**/*.test.ts"],
    environment: "node",
    env: {
      NO_COLOR: "1",
    },
    testTimeout: 20_000,
  },
});
