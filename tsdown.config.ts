import { defineConfig } from "tsdown";

export default defineConfig({
  entry: ["src/cli.ts"],
  format: ["esm"],
  clean: true,
  outDir: "dist",
  noExternal: ["@clack/prompts", "picocolors"],
});
