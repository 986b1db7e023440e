import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    setupFiles: ["src/tests/setup.ts"],
    include: ["src/tests/**/test-*.ts"],
    sequence: {
      concurrent: false,
    },
    testTimeout: 30000,
  },
});
