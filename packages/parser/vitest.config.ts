import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@grammarkit/parser",
    globals: true,
    environment: "node",
  },
});
