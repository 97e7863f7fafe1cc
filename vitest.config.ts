import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["tests/**/*.test.ts"],
    exclude: ["node_modules", "dist"],
    testTimeout: 10000,
    hookTimeout: 10000,
    // External services are replaced by in-process fakes; the logger is silenced here
    setupFiles: ["./tests/setup.ts"],
  },
});
