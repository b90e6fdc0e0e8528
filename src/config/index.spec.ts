/**
 * @file Specs: public config API helpers
 */
import path from "node:path";
import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";

import { configPatternsLabel, loadEngineOptions } from "./index";
import { DEFAULT_CONFIG_STEM } from "./resolve";

async function withTempDir(fn: (dir: string) => Promise<void>): Promise<void> {
  const base = path.resolve(".tmp");
  await mkdir(base, { recursive: true });
  const dir = await mkdtemp(path.join(base, "spec-config-index-"));
  try {
    await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

describe("config/index helpers", () => {
  it("configPatternsLabel lists the extensions in resolution order", () => {
    expect(configPatternsLabel()).toBe("hty.config[mjs/mts/ts/cjs/js]");
  });

  it("loadEngineOptions reads and normalizes an explicit config", async () =>
    withTempDir(async (dir) => {
      const file = path.join(dir, `${DEFAULT_CONFIG_STEM}.mjs`);
      await writeFile(file, "export default { byteOrder: 'big', scanBatchRows: 3 };\n", "utf8");
      const loaded = await loadEngineOptions(path.join(dir, DEFAULT_CONFIG_STEM));
      expect(loaded).toEqual({ path: file, options: { byteOrder: "big", equalityTolerance: 1e-6, scanBatchRows: 3 } });
    }));

  it("loadEngineOptions fails for an explicit path that does not resolve", async () =>
    withTempDir(async (dir) => {
      await expect(loadEngineOptions(path.join(dir, "missing"))).rejects.toThrow(/^Config not found/);
    }));
});
