import { defineConfig, type Options } from "tsup";

export default defineConfig((options: Options) => ({
  entry: { index: "src/cli/index.ts" },
  format: ["esm"],
  target: "node20",
  clean: true,
  ...options,
}));
