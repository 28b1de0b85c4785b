import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: [
      "lifecycle/tests/**/*.test.ts",
      "shell/tests/**/*.test.ts",
    ],
    environment: "node",
    testTimeout: 15_000,
  },
});
