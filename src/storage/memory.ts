/**
 * @file In-memory BlockFile/BlockSink
 * Why: encode whole files to bytes without touching disk, and let specs read
 * hand-built buffers through the same interface as real files.
 */
import type { BlockFile, BlockSink } from "./types";
import { ShortReadError } from "./errors";
import { toUint8 } from "../util/bin";

/** Read-only BlockFile over a byte buffer. */
export function createMemoryBlockFile(data: Uint8Array | ArrayBuffer, path = "memory:"): BlockFile {
  const bytes = toUint8(data);
  return {
    path,
    size() {
      return bytes.length;
    },
    readAt(position: number, length: number): Uint8Array {
      const available = Math.max(0, Math.min(length, bytes.length - position));
      if (position < 0 || available < length) {
        throw new ShortReadError(position, length, available);
      }
      return bytes.slice(position, position + length);
    },
    close() {
      /* nothing to release */
    },
  };
}

/** Growable sink; `bytes()` returns everything written so far. */
export function createMemorySink(): BlockSink & { bytes(): Uint8Array } {
  const parts: Uint8Array[] = [];
  // eslint-disable-next-line no-restricted-syntax -- running write position
  let written = 0;
  return {
    write(data: Uint8Array): void {
      parts.push(data.slice());
      written += data.length;
    },
    position(): number {
      return written;
    },
    bytes(): Uint8Array {
      const out = new Uint8Array(written);
      // eslint-disable-next-line no-restricted-syntax -- tracking offset during concat
      let off = 0;
      for (const p of parts) {
        out.set(p, off);
        off += p.length;
      }
      return out;
    },
  };
}
