/**
 * @file Executable config example (TS)
 * Copy to hty.config.ts (or .mjs/.js) next to where the CLI runs.
 */
import { defineConfig } from "./src/config";

export default defineConfig({
  // Files written on another machine may need an explicit order.
  byteOrder: "native",
  equalityTolerance: 1e-6,
  scanBatchRows: 4096,
});
