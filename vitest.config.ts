import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["expctl/test/**/*.test.ts"],
    pool: "forks",
    testTimeout: 20000,
  },
});
