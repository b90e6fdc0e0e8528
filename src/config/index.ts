/**
 * @file Shared config API surface for the CLI and library users.
 */
import type { EngineOptions } from "../hty/types";
import { defaultEngineOptions } from "../constants/format";
import { CONFIG_EXTS, DEFAULT_CONFIG_STEM, resolveConfigPath } from "./resolve";
import { loadConfigModule } from "./loader";
import { normalizeConfig } from "./normalize";

export { resolveConfigPath, CONFIG_EXTS, DEFAULT_CONFIG_STEM } from "./resolve";
export { loadConfigModule } from "./loader";
export { normalizeConfig, validateRawConfig, defineConfig } from "./normalize";
export type { HtyConfig, ByteOrderSetting } from "./types";

export type LoadedConfig = {
  /** Resolved config file, or null when running on defaults. */
  path: string | null;
  options: EngineOptions;
};

/**
 * Load engine options.
 * An explicit path must resolve to a config file; without one, a missing
 * `./hty.config.*` means defaults.
 */
export async function loadEngineOptions(configPath?: string): Promise<LoadedConfig> {
  const resolved = await resolveConfigPath(configPath);
  if (!resolved) {
    if (configPath) {
      throw new Error(`Config not found. Looked for ${configPath} with extensions ${CONFIG_EXTS.join(", ")}`);
    }
    return { path: null, options: defaultEngineOptions() };
  }
  const raw = await loadConfigModule(resolved);
  return { path: resolved, options: normalizeConfig(raw) };
}

/** A short label like `hty.config[mjs/mts/ts/cjs/js]` for help output. */
export function configPatternsLabel(): string {
  return `${DEFAULT_CONFIG_STEM}[${CONFIG_EXTS.map((e) => e.slice(1)).join("/")}]`;
}
