import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/index.ts"],
  format: ["cjs"],
  target: "node20",
  platform: "node",
  outDir: "dist",
  clean: true,
  splitting: false,
  sourcemap: false,
  dts: false,

  // @diagoku/solver points at its TypeScript sources, so it has to be bundled
  noExternal: [/^@diagoku\//],

  banner: {
    js: "#!/usr/bin/env node",
  },
});
