import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/index.ts"],
  format: ["esm"], // Build only ESM format
  dts: true,
  sourcemap: true,
  clean: true,
});
