/**
 * @file Vite build configuration
 */

import { defineConfig } from "vite";
import react from "@vitejs/plugin-react";
import dts from "vite-plugin-dts";
import { getViteEntries, getAllExternals, getExecutableEntries } from "./build.entries";
import type { Plugin } from "vite";

const executables = new Set(getExecutableEntries());

export default defineConfig({
  plugins: [
    react(),
    dts({
      entryRoot: "src",
      outDir: "dist",
      include: ["src"],
      exclude: ["**/*.spec.*", "tests", "node_modules", "dist"],
      tsconfigPath: "tsconfig.json",
      rollupTypes: false,
    }),
  ] as Plugin[],
  build: {
    outDir: "dist",
    target: "node20",
    lib: {
      entry: getViteEntries(),
      formats: ["cjs", "es"],
    },
    rollupOptions: {
      external: getAllExternals(),
      output: {
        banner: (chunk) => (chunk.isEntry && executables.has(chunk.name) ? "#!/usr/bin/env node" : ""),
      },
    },
  },
});
