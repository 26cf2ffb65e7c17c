import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: [
      "packages/*/test/**/*.test.ts",
      "packages/*/__tests__/**/*.test.ts",
    ],
    environment: "node",
  },
});
