import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["Analysis/src/__tests__/**/*.test.ts"],
  },
});
