/**
 * @file Vitest testing framework configuration
 *
 * Unit specs live beside their sources (`src/**\/*.spec.ts[x]`); end-to-end
 * flows that go through real files on disk live under `tests/`.
 */

import { defineConfig } from "vitest/config";
export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["src/**/*.spec.{ts,tsx}", "tests/**/*.test.ts"],
    setupFiles: [],
  },
});
