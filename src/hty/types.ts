/**
 * @file HTY data model
 *
 * Metadata is an immutable value parsed fresh from the trailer of each file
 * and passed explicitly to every component; nothing mutates it in place.
 */
import type { ByteOrder } from "../util/bin";

/** The single numeric type the format stores. */
export const COLUMN_TYPE = "float" as const;
export type ColumnType = typeof COLUMN_TYPE;

export type ColumnDescriptor = {
  readonly name: string;
  readonly type: ColumnType;
};

export type GroupDescriptor = {
  /** Byte position of the group's data block within the file. */
  readonly offset: number;
  readonly numColumns: number;
  readonly columns: readonly ColumnDescriptor[];
};

export type Metadata = {
  /** Logical row count, identical across all groups. */
  readonly numRows: number;
  readonly numGroups: number;
  readonly groups: readonly GroupDescriptor[];
};

/** Position of a column: its group, and its index inside that group. */
export type ColumnLocation = {
  readonly groupIndex: number;
  readonly columnIndex: number;
};

/** One output sequence of a projection, labelled with the requested name. */
export type ColumnValues = {
  readonly name: string;
  readonly values: number[];
};

export type EngineOptions = {
  /** Byte order of the int32 trailer length and every float32 cell. */
  byteOrder: ByteOrder;
  /** Absolute tolerance used by `=` and `!=`. */
  equalityTolerance: number;
  /** Rows fetched per read while scanning a group. */
  scanBatchRows: number;
};
