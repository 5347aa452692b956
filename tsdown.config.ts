import { defineConfig } from "tsdown";

export default defineConfig({
  entry: {
    index: "packages/core/src/index.ts",
    basedirs: "apps/cli/src/index.ts",
  },
  format: "esm",
  platform: "node",
  target: "node20",
  outDir: "dist",
  clean: true,
  shims: false,
  dts: false,
});
