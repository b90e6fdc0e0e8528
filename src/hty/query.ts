/**
 * @file Query engine: projection, filtering, and both in one pass
 *
 * Every query first resolves its columns to a single group (the locality
 * constraint), then makes one lazy pass over that group's rows, reading them
 * in bounded batches. Metadata is read from the file on every call.
 */
import type { BlockFile } from "../storage/types";
import { withBlockFile } from "../storage/node";
import { ShortReadError } from "../storage/errors";
import { resolveEngineOptions, scanBatchRowsOrDefault } from "../constants/format";
import { EmptyColumnSetError, IOUnavailableError } from "./errors";
import { locateAllSameGroup } from "./locate";
import { compilePredicate, parseOperator, type ValuePredicate } from "./predicate";
import { readRowSpan, type RowSpan } from "./row_group";
import { readTrailer } from "./trailer";
import type { ColumnValues, EngineOptions, GroupDescriptor, Metadata } from "./types";

/** `column <op> value`; `op` is parsed, so unsupported spellings fail with InvalidPredicateOperator. */
export type Condition = {
  column: string;
  op: string;
  value: number;
};

/** View of one row during a scan. */
export type RowCursor = {
  readonly row: number;
  cell(col: number): number;
};

function readSpan(file: BlockFile, group: GroupDescriptor, first: number, count: number, options: EngineOptions): RowSpan {
  try {
    return readRowSpan(file, group, first, count, options.byteOrder);
  } catch (e) {
    if (e instanceof ShortReadError) {
      throw new IOUnavailableError(file.path, "read", e);
    }
    throw e;
  }
}

/** Lazily yield rows `[0, numRows)` of `group`, reading `scanBatchRows` rows at a time. */
export function* scanGroup(
  file: BlockFile,
  group: GroupDescriptor,
  numRows: number,
  options: EngineOptions,
): Generator<RowCursor> {
  const batch = scanBatchRowsOrDefault(options.scanBatchRows);
  for (let first = 0; first < numRows; first += batch) {
    const span = readSpan(file, group, first, Math.min(batch, numRows - first), options);
    for (let row = first; row < first + span.rowCount; row++) {
      yield { row, cell: (col: number) => span.cell(row, col) };
    }
  }
}

function compileCondition(where: Condition, options: EngineOptions): ValuePredicate {
  return compilePredicate(parseOperator(where.op), where.value, options.equalityTolerance);
}

function emptyOutputs(names: readonly string[]): ColumnValues[] {
  return names.map((name) => ({ name, values: [] }));
}

/** Project `names` (one shared group) from an open file. */
export function projectFile(
  file: BlockFile,
  metadata: Metadata,
  names: readonly string[],
  options: EngineOptions,
): ColumnValues[] {
  const { groupIndex, columnIndices } = locateAllSameGroup(metadata, names);
  const group = metadata.groups[groupIndex];
  const out = emptyOutputs(names);
  for (const cursor of scanGroup(file, group, metadata.numRows, options)) {
    columnIndices.forEach((col, i) => {
      out[i].values.push(cursor.cell(col));
    });
  }
  return out;
}

/** Values of `where.column` that satisfy the condition, in row order. */
export function filterFile(file: BlockFile, metadata: Metadata, where: Condition, options: EngineOptions): number[] {
  const predicate = compileCondition(where, options);
  const [projected] = projectFile(file, metadata, [where.column], options);
  return projected.values.filter(predicate);
}

/**
 * Project `names` for the rows where `where` holds, in one pass.
 * The filter column joins the same-group check even when it is not projected.
 */
export function projectAndFilterFile(
  file: BlockFile,
  metadata: Metadata,
  names: readonly string[],
  where: Condition,
  options: EngineOptions,
): ColumnValues[] {
  if (names.length === 0) {
    throw new EmptyColumnSetError();
  }
  const predicate = compileCondition(where, options);
  const { groupIndex, columnIndices } = locateAllSameGroup(metadata, [...names, where.column]);
  const group = metadata.groups[groupIndex];
  const projected = columnIndices.slice(0, names.length);
  const filterCol = columnIndices[names.length];
  const out = emptyOutputs(names);
  for (const cursor of scanGroup(file, group, metadata.numRows, options)) {
    if (!predicate(cursor.cell(filterCol))) {
      continue;
    }
    projected.forEach((col, i) => {
      out[i].values.push(cursor.cell(col));
    });
  }
  return out;
}

function withMetadata<T>(
  path: string,
  options: Partial<EngineOptions> | undefined,
  fn: (file: BlockFile, metadata: Metadata, resolved: EngineOptions) => T,
): T {
  const resolved = resolveEngineOptions(options);
  return withBlockFile(path, (file) => fn(file, readTrailer(file, resolved.byteOrder), resolved));
}

/** Project one or more same-group columns of the file at `path`. */
export function project(path: string, names: readonly string[], options?: Partial<EngineOptions>): ColumnValues[] {
  return withMetadata(path, options, (file, metadata, resolved) => projectFile(file, metadata, names, resolved));
}

/** Filter one column of the file at `path`; returns the passing values only. */
export function filter(path: string, where: Condition, options?: Partial<EngineOptions>): number[] {
  parseOperator(where.op);
  return withMetadata(path, options, (file, metadata, resolved) => filterFile(file, metadata, where, resolved));
}

/** Project `names` of the file at `path` for rows where `where` holds. */
export function projectAndFilter(
  path: string,
  names: readonly string[],
  where: Condition,
  options?: Partial<EngineOptions>,
): ColumnValues[] {
  parseOperator(where.op);
  return withMetadata(path, options, (file, metadata, resolved) =>
    projectAndFilterFile(file, metadata, names, where, resolved),
  );
}
