/**
 * @file Build entry catalog - Defines all entry points
 *
 * This file serves as the single source of truth for:
 * 1. Vite build configuration (entry points and externals)
 * 2. Which entries are executables (emitted with a shebang)
 *
 * Adding a new entry:
 * ```typescript
 * "my-module/index": {
 *   path: "src/my-module/index.ts",
 *   description: "My module description",
 *   external: ["some-dep"], // optional external dependencies
 * }
 * ```
 */

export type EntryConfig = {
  /**
   * Entry file path relative to project root
   */
  path: string;
  /**
   * Optional description of the entry
   */
  description?: string;
  /**
   * External dependencies for this entry (passed to Rollup)
   */
  external?: string[];
  /**
   * Emit a `#!/usr/bin/env node` banner for this entry
   */
  executable?: boolean;
};

export type EntryCatalog = {
  [entryName: string]: EntryConfig;
};

/**
 * Catalog of all build entries
 */
export const entries: EntryCatalog = {
  // Main entry: format, query and append engine
  index: {
    path: "src/index.ts",
    description: "Main library entry point",
  },

  // CLI - Node.js only
  "cli/index": {
    path: "src/cli/main.tsx",
    description: "Command line interface",
    external: ["ink", "ink-select-input", "ink-text-input", "react", "react/jsx-runtime"],
    executable: true,
  },

  // Config public surface
  "config/index": {
    path: "src/config/index.ts",
    description: "Config API surface and helpers",
  },

  // Output formatting, importable without the engine
  "output/format": {
    path: "src/output/format.ts",
    description: "User-facing number formatting",
  },
};

/**
 * Names of entries emitted as executables
 */
export function getExecutableEntries(): string[] {
  return Object.entries(entries)
    .filter(([, config]) => config.executable === true)
    .map(([name]) => name);
}

/**
 * Get all external dependencies for all entries
 */
export function getAllExternals(): Array<string | RegExp> {
  const externals = new Set<string | RegExp>();

  // Add Node.js built-ins
  externals.add(/node:.+/);

  // Add entry-specific externals
  for (const config of Object.values(entries)) {
    if (config.external) {
      config.external.forEach((ext) => externals.add(ext));
    }
  }

  return Array.from(externals);
}

/**
 * Convert entries to Vite lib entry format
 */
export function getViteEntries(): Record<string, string> {
  const viteEntries: Record<string, string> = {};

  for (const [name, config] of Object.entries(entries)) {
    viteEntries[name] = config.path;
  }

  return viteEntries;
}
