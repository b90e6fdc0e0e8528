/**
 * @file Unit tests for format constants and engine option defaults
 */
import { endianness } from "node:os";
import { defaultEngineOptions, nativeByteOrder, resolveEngineOptions, scanBatchRowsOrDefault } from "./format";

describe("constants/format", () => {
  it("native order follows the platform", () => {
    expect(nativeByteOrder()).toBe(endianness() === "LE" ? "little" : "big");
  });

  it("defaults", () => {
    expect(defaultEngineOptions()).toEqual({
      byteOrder: nativeByteOrder(),
      equalityTolerance: 1e-6,
      scanBatchRows: 4096,
    });
  });

  it("resolveEngineOptions keeps given fields and fills the rest", () => {
    expect(resolveEngineOptions({ scanBatchRows: 2, byteOrder: "big" })).toEqual({
      byteOrder: "big",
      equalityTolerance: 1e-6,
      scanBatchRows: 2,
    });
    expect(resolveEngineOptions()).toEqual(defaultEngineOptions());
  });

  it("replaces unusable batch sizes with the default", () => {
    expect([Number.NaN, 0, -3, 2.5, Number.POSITIVE_INFINITY, undefined].map(scanBatchRowsOrDefault)).toEqual([
      4096, 4096, 4096, 4096, 4096, 4096,
    ]);
    expect(scanBatchRowsOrDefault(7)).toBe(7);
    expect(resolveEngineOptions({ scanBatchRows: Number.NaN }).scanBatchRows).toBe(4096);
  });
});
