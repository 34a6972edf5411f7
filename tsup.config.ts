import { defineConfig } from "tsup";

export default defineConfig({
  entry:    { index: "src/index.ts" },
  format:   ["esm", "cjs"],
  dts:      true,
  clean:    true,
  // The stream logger reads process.env and writes to process.stderr.
  platform: "node",
  target:   "node20",
});
