/**
 * @file Config module loader (CJS/ESM/TS)
 */
import path from "node:path";
import { pathToFileURL } from "node:url";
import { createRequire } from "node:module";
import { resolveConfigPath, CONFIG_EXTS, DEFAULT_CONFIG_STEM } from "./resolve";
import { hasErrorMessage } from "../util/is-error";
import { isObject } from "../util/is-object";

function defaultExport(mod: unknown): unknown {
  if (isObject(mod) && "default" in mod) {
    return mod.default;
  }
  return mod;
}

/** Load a config module and return its default export (or module itself). */
export async function loadConfigModule(configPath?: string): Promise<unknown> {
  const resolved = await resolveConfigPath(configPath);
  if (!resolved) {
    const stem = DEFAULT_CONFIG_STEM;
    throw new Error(
      `Config not found. Looked for ${configPath ?? stem + ".*"} with extensions ${CONFIG_EXTS.join(", ")}`,
    );
  }
  const ext = path.extname(resolved).toLowerCase();
  if (ext === ".cjs") {
    const req = createRequire(import.meta.url);
    return defaultExport(req(resolved));
  }
  const url = pathToFileURL(resolved).href;
  try {
    // eslint-disable-next-line no-restricted-syntax -- dynamic import is required to load user config modules
    const mod: unknown = await import(url);
    return defaultExport(mod);
  } catch (e) {
    if (ext === ".ts" || ext === ".mts") {
      const original = hasErrorMessage(e) ? String(e.message) : String(e);
      throw new Error(
        `Failed to load TypeScript config '${path.basename(resolved)}'. ` +
          `Run through a TS loader (e.g., tsx) or pre-compile to .mjs/.js. Original: ${original}`,
        { cause: e },
      );
    }
    throw e;
  }
}
