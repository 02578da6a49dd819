import { defineConfig } from "tsup";
import type { Options } from "tsup";

export default defineConfig((options: Options) => ({
  entry: [
    "src/index.ts",
    "src/schemas/index.ts",
    "src/errors/index.ts",
    "src/logger/index.ts",
    "src/constants/index.ts",
  ],
  format: ["esm"],
  dts: true,
  splitting: false,
  sourcemap: true,
  // Keep output in watch mode so the engine can keep resolving it
  clean: !options.watch,
  treeshake: true,
}));
