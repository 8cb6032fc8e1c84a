import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["shared/tests/**/*.test.ts", "queue/tests/**/*.test.ts", "control-plane/tests/**/*.test.ts", "worker/tests/**/*.test.ts"],
    environment: "node",
    testTimeout: 10_000
  }
});
