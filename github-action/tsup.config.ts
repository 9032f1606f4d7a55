import { defineConfig } from "tsup";

export default defineConfig({
  entry: {
    action: "github-action/index.ts",
  },
  format: ["esm"],
  target: "node20",
  outDir: "dist-action",
  // the runner checks out the action without node_modules
  noExternal: [/.*/],
  dts: false,
  sourcemap: false,
  splitting: false,
  clean: true,
});
