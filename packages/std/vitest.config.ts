import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@fuzzgraph/std",
    include: ["tests/**/*.test.ts"],
    environment: "node",
  },
});
