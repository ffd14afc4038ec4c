import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@matrica/math",
    include: ["tests/**/*.test.ts"],
    environment: "node",
  },
});
