import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    exclude: ["node_modules", "dist"],
    environment: "node",
    setupFiles: ["./tests/setup.ts"],
    testTimeout: 10000,
    clearMocks: true,
    restoreMocks: true,
    unstubGlobals: true,
  },
});
