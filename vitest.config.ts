import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["backend/__tests__/**/*.test.ts"],
    setupFiles: ["backend/__tests__/setup.ts"]
  }
});
