import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@fuzzgraph/core",
    include: ["tests/**/*.test.ts"],
    environment: "node",
  },
});
