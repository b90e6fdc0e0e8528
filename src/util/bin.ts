/**
 * @file Binary I/O utilities for HTY serialization
 *
 * Low-level readers and writers for the two primitive widths the format uses:
 * signed 32-bit integers (the trailer length) and IEEE-754 float32 values
 * (every data cell). Byte order is explicit on every call because HTY files
 * are written in the producing platform's native order.
 */

export type ByteOrder = "little" | "big";

/** Byte width of one stored value (float32) and of the trailer length (int32). */
export const WORD_SIZE = 4;

/** Convert ArrayBuffer to Uint8Array (no-copy when possible). */
export function toUint8(data: Uint8Array | ArrayBuffer): Uint8Array {
  return data instanceof Uint8Array ? data : new Uint8Array(data);
}

function viewOf(u8: Uint8Array): DataView {
  return new DataView(u8.buffer, u8.byteOffset, u8.byteLength);
}

/** Read a signed 32-bit integer at `at`. */
export function readI32At(u8: Uint8Array, at: number, order: ByteOrder): number {
  return viewOf(u8).getInt32(at, order === "little");
}

/** Read a float32 at `at`, widened to a JS number. */
export function readF32At(u8: Uint8Array, at: number, order: ByteOrder): number {
  return viewOf(u8).getFloat32(at, order === "little");
}

export type BinWriter = {
  pushI32(v: number): void;
  pushF32(v: number): void;
  pushBytes(u8: Uint8Array): void;
  byteLength(): number;
  concat(): Uint8Array;
};

/**
 *
 */
export function createWriter(order: ByteOrder): BinWriter {
  const parts: Uint8Array[] = [];
  const little = order === "little";
  // eslint-disable-next-line no-restricted-syntax -- running size avoids a second pass in concat
  let total = 0;
  function push(u8: Uint8Array): void {
    parts.push(u8);
    total += u8.length;
  }
  function pushI32(v: number): void {
    const b = new Uint8Array(WORD_SIZE);
    new DataView(b.buffer).setInt32(0, v | 0, little);
    push(b);
  }
  function pushF32(v: number): void {
    const b = new Uint8Array(WORD_SIZE);
    new DataView(b.buffer).setFloat32(0, v, little);
    push(b);
  }
  function pushBytes(u8: Uint8Array): void {
    push(u8);
  }
  function byteLength(): number {
    return total;
  }
  function concat(): Uint8Array {
    const out = new Uint8Array(total);
    // eslint-disable-next-line no-restricted-syntax -- tracking offset position requires mutable variable
    let off = 0;
    for (const p of parts) {
      out.set(p, off);
      off += p.length;
    }
    return out;
  }
  return { pushI32, pushF32, pushBytes, byteLength, concat };
}
