/**
 * @file Config normalization + validation (raw module export -> EngineOptions)
 */
import type { EngineOptions } from "../hty/types";
import { resolveEngineOptions, nativeByteOrder } from "../constants/format";
import { isObject } from "../util/is-object";
import type { ByteOrder } from "../util/bin";
import type { ByteOrderSetting, HtyConfig } from "./types";

const BYTE_ORDERS: readonly ByteOrderSetting[] = ["native", "little", "big"];
const KNOWN_KEYS: readonly string[] = ["byteOrder", "equalityTolerance", "scanBatchRows"];

/** Authoring helper to get type inference in user configs. */
export function defineConfig(x: HtyConfig): HtyConfig {
  return x;
}

function isByteOrderSetting(x: unknown): x is ByteOrderSetting {
  return typeof x === "string" && BYTE_ORDERS.some((o) => o === x);
}

function readByteOrder(x: unknown): ByteOrderSetting | undefined {
  if (x === undefined) {
    return undefined;
  }
  if (!isByteOrderSetting(x)) {
    throw new Error(`byteOrder must be one of ${BYTE_ORDERS.join(", ")}`);
  }
  return x;
}

function readTolerance(x: unknown): number | undefined {
  if (x === undefined) {
    return undefined;
  }
  if (typeof x !== "number" || !Number.isFinite(x) || x <= 0) {
    throw new Error("equalityTolerance must be a positive finite number");
  }
  return x;
}

function readBatchRows(x: unknown): number | undefined {
  if (x === undefined) {
    return undefined;
  }
  if (typeof x !== "number" || !Number.isSafeInteger(x) || x <= 0) {
    throw new Error("scanBatchRows must be a positive integer");
  }
  return x;
}

/** Validate raw config shape. Throws with a descriptive message on invalid. */
export function validateRawConfig(raw: unknown): HtyConfig {
  if (!isObject(raw)) {
    throw new Error("config must be an object (JS/TS module export)");
  }
  const unknownKeys = Object.keys(raw).filter((k) => !KNOWN_KEYS.includes(k));
  if (unknownKeys.length > 0) {
    throw new Error(`unknown config keys: ${unknownKeys.join(", ")}`);
  }
  return {
    byteOrder: readByteOrder(raw.byteOrder),
    equalityTolerance: readTolerance(raw.equalityTolerance),
    scanBatchRows: readBatchRows(raw.scanBatchRows),
  };
}

function toByteOrder(setting: ByteOrderSetting | undefined): ByteOrder | undefined {
  if (setting === "native") {
    return nativeByteOrder();
  }
  return setting;
}

/** Normalize raw config into engine options, filling defaults. */
export function normalizeConfig(raw: unknown): EngineOptions {
  const cfg = validateRawConfig(raw);
  return resolveEngineOptions({
    byteOrder: toByteOrder(cfg.byteOrder),
    equalityTolerance: cfg.equalityTolerance,
    scanBatchRows: cfg.scanBatchRows,
  });
}
