import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@fuzzgraph/collections",
    include: ["tests/**/*.test.ts"],
    environment: "node",
  },
});
