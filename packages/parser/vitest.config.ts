import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@combjson/parser",
    globals: true,
    environment: "node",
  },
});
