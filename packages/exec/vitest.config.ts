import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@procmux/exec",
    include: ["test/**/*.test.ts"],
    exclude: ["dist/**", "node_modules/**"],
    environment: "node",
    testTimeout: 30000, // Spawns real processes, some writing megabytes
    globals: true,
  },
});
