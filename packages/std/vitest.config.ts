import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@matrica/std",
    include: ["tests/**/*.test.ts"],
    environment: "node",
  },
});
