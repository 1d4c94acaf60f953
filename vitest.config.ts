import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/*.test.ts"],
    // Engine fakes keep every test in-process; nothing here should take long.
    testTimeout: 10_000,
  },
});
