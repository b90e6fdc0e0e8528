/**
 * @file Column layout for result tables
 */
import type { ColumnValues } from "../../hty/types";
import { formatValue } from "../../output/format";

const GAP = "  ";

/**
 * Header line of column names, then one line per row of formatted values.
 * Cells are left-aligned to the widest entry of their column; trailing
 * spaces are trimmed. Columns are assumed to be of equal length.
 */
export function layoutColumns(columns: readonly ColumnValues[]): string[] {
  const cells = columns.map((c) => [c.name, ...c.values.map(formatValue)]);
  const widths = cells.map((col) => col.reduce((w, s) => Math.max(w, s.length), 0));
  const height = cells.reduce((h, col) => Math.max(h, col.length), 0);
  return Array.from({ length: height }, (_, r) =>
    cells
      .map((col, c) => (col[r] ?? "").padEnd(widths[c], " "))
      .join(GAP)
      .trimEnd(),
  );
}
