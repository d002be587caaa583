import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@fuzzgraph/graph",
    include: ["tests/**/*.test.ts"],
    environment: "node",
  },
});
