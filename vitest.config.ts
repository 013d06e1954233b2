import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["packages/*/test/**/*.test.ts"],
    // CLI and MCP tests spawn tsx processes.
    testTimeout: 30000,
    hookTimeout: 30000,
  },
});
