import { defineConfig } from "tsup";

export default defineConfig({
  entry: {
    cli: "packages/cli/src/index.ts",
    parser: "packages/parser/src/index.ts",
    json: "packages/json/src/index.ts",
  },
  format: ["esm"],
  target: "node20",
  sourcemap: true,
  clean: true,
  splitting: false,
  // Workspace packages are bundled; config loading stays a runtime dependency.
  external: ["cosmiconfig"],
});
