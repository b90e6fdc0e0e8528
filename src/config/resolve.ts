/**
 * @file Config path resolution
 */
import path from "node:path";
import { access } from "node:fs/promises";
import { constants as fsConstants } from "node:fs";

/** Supported executable config extensions (resolution order). */
export const CONFIG_EXTS = [".mjs", ".mts", ".ts", ".cjs", ".js"] as const;
/** Default, extensionless config file stem used across the project. */
export const DEFAULT_CONFIG_STEM = "hty.config" as const;

async function exists(p: string): Promise<boolean> {
  try {
    await access(p, fsConstants.F_OK);
    return true;
  } catch {
    return false;
  }
}

async function firstExisting(candidates: readonly string[]): Promise<string | null> {
  for (const cand of candidates) {
    if (await exists(cand)) {
      return cand;
    }
  }
  return null;
}

/** Resolve a config path: allow directory, bare name, or explicit file. */
export async function resolveConfigPath(input?: string): Promise<string | null> {
  const base = input ? path.resolve(input) : path.resolve(DEFAULT_CONFIG_STEM);
  if (CONFIG_EXTS.some((e) => base.endsWith(e))) {
    return (await exists(base)) ? base : null;
  }
  const withExt = await firstExisting(CONFIG_EXTS.map((ext) => `${base}${ext}`));
  if (withExt) {
    return withExt;
  }
  return firstExisting(CONFIG_EXTS.map((ext) => path.join(base, `${DEFAULT_CONFIG_STEM}${ext}`)));
}
