import { defineConfig } from "tsdown";

export default defineConfig({
  entry: {
    basedirs: "packages/cli/src/cli.ts",
  },
  format: "esm",
  platform: "node",
  target: "node20",
  outDir: "dist",
  clean: true,
  shims: false,
});
