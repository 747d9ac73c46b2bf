import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@combjson/cli",
    globals: true,
    environment: "node",
  },
});
