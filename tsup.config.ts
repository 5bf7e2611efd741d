// tsup.config.ts
import { defineConfig } from "tsup";

export default defineConfig([
  {
    entry: ["src/index.ts"],
    format: ["esm", "cjs"],
    sourcemap: true,
    dts: true,
    clean: true,
    treeshake: true,
    minify: false,
    target: "es2020",
    outDir: "dist",
  },
  {
    entry: ["src/bin.ts"],
    format: ["esm"],
    sourcemap: true,
    clean: false,
    target: "node20",
    outDir: "dist",
  },
]);
