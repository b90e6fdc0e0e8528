/**
 * @file Column locator: name → (group, column) resolution
 *
 * Names are not required to be unique. Lookups resolve to the first
 * occurrence scanning groups in ascending order, then columns in ascending
 * order inside each group.
 */
import { ColumnNotFoundError, CrossGroupQueryError, EmptyColumnSetError } from "./errors";
import type { ColumnLocation, Metadata } from "./types";

export type ColumnIndex = ReadonlyMap<string, ColumnLocation>;

/** Selection of columns that share one group, in the order they were requested. */
export type GroupSelection = {
  readonly groupIndex: number;
  readonly columnIndices: readonly number[];
};

/** Build the name → location map for one metadata value (first occurrence wins). */
export function buildColumnIndex(metadata: Metadata): ColumnIndex {
  const index = new Map<string, ColumnLocation>();
  metadata.groups.forEach((group, groupIndex) => {
    group.columns.forEach((column, columnIndex) => {
      if (!index.has(column.name)) {
        index.set(column.name, { groupIndex, columnIndex });
      }
    });
  });
  return index;
}

function lookup(index: ColumnIndex, name: string): ColumnLocation {
  if (name === "") {
    throw new ColumnNotFoundError(name);
  }
  const hit = index.get(name);
  if (!hit) {
    throw new ColumnNotFoundError(name);
  }
  return hit;
}

/** Locate one column by name. */
export function locate(metadata: Metadata, name: string): ColumnLocation {
  return lookup(buildColumnIndex(metadata), name);
}

/**
 * Locate every name and require a single shared group.
 * Runs before any data is read, so a rejected query touches no rows.
 */
export function locateAllSameGroup(metadata: Metadata, names: readonly string[]): GroupSelection {
  if (names.length === 0) {
    throw new EmptyColumnSetError();
  }
  const index = buildColumnIndex(metadata);
  const hits = names.map((name) => ({ name, ...lookup(index, name) }));
  const groupIndex = hits[0].groupIndex;
  if (hits.some((h) => h.groupIndex !== groupIndex)) {
    throw new CrossGroupQueryError(hits.map((h) => ({ column: h.name, groupIndex: h.groupIndex })));
  }
  return { groupIndex, columnIndices: hits.map((h) => h.columnIndex) };
}
