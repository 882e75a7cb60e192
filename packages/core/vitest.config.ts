import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@grammarkit/core",
    globals: true,
    environment: "node",
  },
});
