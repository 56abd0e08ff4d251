import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/index.ts"],
  format: ["cjs"],
  target: "node20",
  outDir: "bundle",
  clean: true,
  sourcemap: true,
  // The action runtime loads one file with every dependency inlined
  noExternal: [/.*/],
});
