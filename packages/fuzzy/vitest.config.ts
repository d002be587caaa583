import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@fuzzgraph/fuzzy",
    include: ["tests/**/*.test.ts"],
    environment: "node",
  },
});
