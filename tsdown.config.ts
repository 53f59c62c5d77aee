import { defineConfig } from "tsdown";

export default defineConfig([
  {
    entry: ["./src/index.ts"],
    platform: "node",
    dts: true,
    sourcemap: true,
  },
  {
    entry: ["./tools/legalize.ts"],
    platform: "node",
    dts: false,
    sourcemap: true,
    outDir: "dist/tools",
  },
]);
