import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@combjson/json",
    globals: true,
    environment: "node",
  },
});
