/**
 * @file Storage error types
 */
/* eslint-disable no-restricted-syntax -- Error classes are idiomatic for exceptions and enable instanceof checks */

/** Thrown when a positional read returns fewer bytes than requested. */
export class ShortReadError extends Error {
  readonly position: number;
  readonly expected: number;
  readonly actual: number;
  constructor(position: number, expected: number, actual: number) {
    super(`short read at ${position}: expected ${expected} bytes, got ${actual}`);
    this.name = "ShortReadError";
    this.position = position;
    this.expected = expected;
    this.actual = actual;
  }
}
