import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: [
      "shared/*/test/**/*.test.ts",
      "shell/*/test/**/*.test.ts",
      "interfaces/*/test/**/*.test.ts",
    ],
    globals: false,
    environment: "node",
    testTimeout: 20000,
  },
});
