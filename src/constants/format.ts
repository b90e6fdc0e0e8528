/**
 * @file HTY binary format constants
 *
 * Layout of a file, front to back:
 * - zero or more group blocks of row-major float32 values
 * - the metadata block (UTF-8 JSON)
 * - a signed int32 holding the metadata block's byte length
 *
 * Integers and floats are stored in the writing platform's native order.
 */
import { endianness } from "node:os";
import type { ByteOrder } from "../util/bin";
import type { EngineOptions } from "../hty/types";

/** Bytes per stored cell (float32). */
export const FLOAT_SIZE = 4;
/** Bytes of the trailing metadata length (int32). */
export const TRAILER_LENGTH_SIZE = 4;

/** Default absolute tolerance for `=` and `!=` on lossy float32 values. */
export const EQUALITY_TOLERANCE = 1e-6;
/** Default number of rows fetched per read during a scan. */
export const SCAN_BATCH_ROWS = 4096;

/** `n` when it is a usable batch size (positive safe integer), else the default. */
export function scanBatchRowsOrDefault(n: number | undefined): number {
  return n !== undefined && Number.isSafeInteger(n) && n > 0 ? n : SCAN_BATCH_ROWS;
}

/** Byte order of the running platform. */
export function nativeByteOrder(): ByteOrder {
  return endianness() === "LE" ? "little" : "big";
}

/** Engine defaults: native order, 1e-6 tolerance, 4096-row batches. */
export function defaultEngineOptions(): EngineOptions {
  return {
    byteOrder: nativeByteOrder(),
    equalityTolerance: EQUALITY_TOLERANCE,
    scanBatchRows: SCAN_BATCH_ROWS,
  };
}

/** Fill unspecified options with defaults. */
export function resolveEngineOptions(partial?: Partial<EngineOptions>): EngineOptions {
  const defaults = defaultEngineOptions();
  return {
    byteOrder: partial?.byteOrder ?? defaults.byteOrder,
    equalityTolerance: partial?.equalityTolerance ?? defaults.equalityTolerance,
    scanBatchRows: scanBatchRowsOrDefault(partial?.scanBatchRows),
  };
}
