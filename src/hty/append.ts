/**
 * @file Mutation engine: append rows by rewriting the whole file
 *
 * Every group block must grow and every later group must shift, so an append
 * copies the source into a new destination file: old block, then the new
 * rows' slice for that group, group after group, then a fresh trailer. The
 * source is only ever opened for reading.
 *
 * Not safe against a concurrent reader of the destination path: callers must
 * not append to a path another process is reading.
 */
import { resolve as resolvePath } from "node:path";
import type { BlockFile, BlockSink } from "../storage/types";
import { withBlockFile, writeFileAtomic } from "../storage/node";
import { ShortReadError } from "../storage/errors";
import { createWriter, type ByteOrder } from "../util/bin";
import { resolveEngineOptions } from "../constants/format";
import { IOUnavailableError, InvalidDestinationError, NoRowsProvidedError, RowShapeMismatchError } from "./errors";
import { readGroupBlock } from "./row_group";
import { groupBlockSize, readMetadata, writeTrailer } from "./trailer";
import type { EngineOptions, GroupDescriptor, Metadata } from "./types";

export type Row = readonly number[];

/** Total column count across all groups: the width every appended row must have. */
export function totalColumns(metadata: Metadata): number {
  return metadata.groups.reduce((sum, g) => sum + g.numColumns, 0);
}

/** Throws NoRowsProvided / RowShapeMismatch; runs before anything is written. */
export function validateRows(metadata: Metadata, rows: readonly Row[]): void {
  if (rows.length === 0) {
    throw new NoRowsProvidedError();
  }
  const expected = totalColumns(metadata);
  rows.forEach((row, i) => {
    if (row.length !== expected) {
      throw new RowShapeMismatchError(i, expected, row.length);
    }
  });
}

/**
 * Metadata after appending `rowCount` rows: same descriptors, groups laid out
 * back to back from offset 0, `numRows` incremented.
 */
export function planAppend(metadata: Metadata, rowCount: number): Metadata {
  const numRows = metadata.numRows + rowCount;
  const groups = metadata.groups.reduce<{ next: number; out: GroupDescriptor[] }>(
    (acc, g) => ({
      next: acc.next + groupBlockSize(g, numRows),
      out: [...acc.out, { ...g, offset: acc.next }],
    }),
    { next: 0, out: [] },
  ).out;
  return { numRows, numGroups: metadata.numGroups, groups };
}

/** First column index (across the whole row) of each group. */
function groupStarts(metadata: Metadata): number[] {
  return metadata.groups.map((_, i) => metadata.groups.slice(0, i).reduce((sum, g) => sum + g.numColumns, 0));
}

function encodeSlices(rows: readonly Row[], start: number, width: number, order: ByteOrder): Uint8Array {
  const w = createWriter(order);
  for (const row of rows) {
    for (let c = start; c < start + width; c++) {
      w.pushF32(row[c]);
    }
  }
  return w.concat();
}

function copyBlock(source: BlockFile, group: GroupDescriptor, numRows: number): Uint8Array {
  try {
    return readGroupBlock(source, group, numRows);
  } catch (e) {
    if (e instanceof ShortReadError) {
      throw new IOUnavailableError(source.path, "read", e);
    }
    throw e;
  }
}

/** Stream the appended file into `sink`; returns the metadata written in its trailer. */
export function writeAppended(
  source: BlockFile,
  metadata: Metadata,
  rows: readonly Row[],
  sink: BlockSink,
  order: ByteOrder,
): Metadata {
  validateRows(metadata, rows);
  const planned = planAppend(metadata, rows.length);
  const starts = groupStarts(metadata);
  const groups = metadata.groups.map((group, i): GroupDescriptor => {
    // offsets come from the bytes actually written, then are checked against the plan
    const offset = sink.position();
    if (offset !== planned.groups[i].offset) {
      throw new Error(`group ${i} starts at ${offset}, planned ${planned.groups[i].offset}`);
    }
    sink.write(copyBlock(source, group, metadata.numRows));
    sink.write(encodeSlices(rows, starts[i], group.numColumns, order));
    return { ...group, offset };
  });
  const next: Metadata = { numRows: planned.numRows, numGroups: metadata.numGroups, groups };
  writeTrailer(sink, next, order);
  return next;
}

/**
 * Append `rows` to the file at `sourcePath`, writing the result to `destPath`.
 * `metadata` must be the source's current trailer. Validation happens before
 * the destination is created; the destination appears only once complete.
 */
export function addRows(
  metadata: Metadata,
  sourcePath: string,
  destPath: string,
  rows: readonly Row[],
  options?: Partial<EngineOptions>,
): Metadata {
  const { byteOrder } = resolveEngineOptions(options);
  validateRows(metadata, rows);
  if (resolvePath(sourcePath) === resolvePath(destPath)) {
    throw new InvalidDestinationError(destPath);
  }
  return withBlockFile(sourcePath, (source) =>
    writeFileAtomic(destPath, (sink) => writeAppended(source, metadata, rows, sink, byteOrder)),
  );
}

/** Read the source trailer, then append. */
export function appendRows(
  sourcePath: string,
  destPath: string,
  rows: readonly Row[],
  options?: Partial<EngineOptions>,
): Metadata {
  return addRows(readMetadata(sourcePath, options), sourcePath, destPath, rows, options);
}
