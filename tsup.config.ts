import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/index.ts"],
  format: ["esm", "cjs"],
  dts: true,
  sourcemap: true,
  clean: true,
  outDir: "dist",
  // Keep modules intact for tree-shaking
  splitting: false,
  // .mjs for esm, .cjs for cjs
  outExtension({ format }) {
    if (format === "cjs") return { js: ".cjs" };
    return { js: ".mjs" };
  },
});
