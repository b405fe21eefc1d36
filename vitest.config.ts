// /vitest.config.ts
import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["backend/test/**/*.spec.ts"],
    testTimeout: 10000,
    restoreMocks: true,
    watch: false,
    reporters: ["default"],
  },
});
