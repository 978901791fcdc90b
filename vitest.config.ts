import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["test/**/*.test.ts"],
    environment: "node",
    setupFiles: ["test/setup.ts"],
    isolate: true,
    testTimeout: 10000,
    hookTimeout: 10000,
  },
});
