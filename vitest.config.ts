import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["batch_translate/**/__tests__/**/*.test.ts", "logging/**/__tests__/**/*.test.ts"],
    environment: "node",
  },
});
