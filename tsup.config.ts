import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["index.ts", "plugins/index.ts"],
  format: ["esm"],
  dts: true,
  clean: true,
  outDir: "dist",
  splitting: false,
  sourcemap: false,
});
