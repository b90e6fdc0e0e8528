/**
 * @file Config types: the shape of `hty.config.*` modules
 */

/** `native` resolves to the running platform's order (`os.endianness()`). */
export type ByteOrderSetting = "native" | "little" | "big";

export type HtyConfig = {
  /** Byte order of trailer length and float cells. Default: native. */
  byteOrder?: ByteOrderSetting;
  /** Absolute tolerance for `=` / `!=` predicates. Default: 1e-6. */
  equalityTolerance?: number;
  /** Rows read per batch while scanning. Default: 4096. */
  scanBatchRows?: number;
};
