/**
 * @file Row-group reader
 *
 * Inside a group, values are row-major: row `r`, column `c` lives at
 * `offset + (r * numColumns + c) * 4`. None of these primitives check `row`
 * against the file's row count; the query engine only passes rows below it.
 */
import type { BlockFile } from "../storage/types";
import { readF32At, type ByteOrder } from "../util/bin";
import { FLOAT_SIZE } from "../constants/format";
import { groupBlockSize } from "./trailer";
import type { GroupDescriptor } from "./types";

/** Absolute byte offset of (row, col) inside `group`. */
export function cellOffset(group: GroupDescriptor, row: number, col: number): number {
  return group.offset + (row * group.numColumns + col) * FLOAT_SIZE;
}

/** Read one float32 cell. */
export function readCell(file: BlockFile, group: GroupDescriptor, row: number, col: number, order: ByteOrder): number {
  return readF32At(file.readAt(cellOffset(group, row, col), FLOAT_SIZE), 0, order);
}

/** Read the group's whole data block (`numRows * numColumns * 4` bytes) in one pass. */
export function readGroupBlock(file: BlockFile, group: GroupDescriptor, numRows: number): Uint8Array {
  return file.readAt(group.offset, groupBlockSize(group, numRows));
}

/** A contiguous run of rows of one group, decoded on demand. */
export type RowSpan = {
  readonly firstRow: number;
  readonly rowCount: number;
  cell(row: number, col: number): number;
};

/** Read rows `[firstRow, firstRow + rowCount)` of `group` with a single read. */
export function readRowSpan(
  file: BlockFile,
  group: GroupDescriptor,
  firstRow: number,
  rowCount: number,
  order: ByteOrder,
): RowSpan {
  const rowBytes = group.numColumns * FLOAT_SIZE;
  const bytes = file.readAt(cellOffset(group, firstRow, 0), rowCount * rowBytes);
  return {
    firstRow,
    rowCount,
    cell(row: number, col: number): number {
      return readF32At(bytes, (row - firstRow) * rowBytes + col * FLOAT_SIZE, order);
    },
  };
}
