import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@matrica/core",
    include: ["tests/**/*.test.ts"],
    environment: "node",
    // config tests chdir into temp directories
    pool: "forks",
  },
});
