/**
 * @file Positional block I/O abstraction
 * Why: the format is read by seeking to computed byte offsets, and written
 * front to back in one pass; both backends (disk, memory) expose only that.
 */

/** Random-access, read-only view of one file. */
export type BlockFile = {
  readonly path: string;
  size(): number;
  /** Read exactly `length` bytes at `position`; throws ShortReadError otherwise. */
  readAt(position: number, length: number): Uint8Array;
  close(): void;
};

/** Sequential writer; `position()` is the number of bytes written so far. */
export type BlockSink = {
  write(data: Uint8Array): void;
  position(): number;
};
