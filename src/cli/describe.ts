/**
 * @file Plain-text summaries for CLI output
 */
import type { ColumnValues, Metadata } from "../hty/types";
import { isHtyError } from "../hty/errors";
import { hasErrorMessage } from "../util/is-error";
import { UsageError } from "./args";
import { layoutColumns } from "./ui/layout";

/** Lines describing the layout recorded in a trailer. */
export function describeMetadata(m: Metadata): string[] {
  const head = [`rows: ${m.numRows}`, `groups: ${m.numGroups}`];
  const groups = m.groups.flatMap((g, i) => [
    `group ${i}: offset ${g.offset}, ${g.numColumns} column(s)`,
    ...g.columns.map((c, j) => `  [${j}] ${c.name} (${c.type})`),
  ]);
  return [...head, ...groups];
}

/** Write result columns as plain text, one `write` call per line. */
export function printColumns(columns: readonly ColumnValues[], write: (line: string) => void = console.log): void {
  layoutColumns(columns).forEach((line) => write(line));
}

/** One-line error report: HTY errors carry their kind. */
export function formatError(e: unknown): string {
  if (isHtyError(e)) {
    return `error [${e.kind}]: ${e.message}`;
  }
  if (e instanceof UsageError) {
    return `usage error: ${e.message}`;
  }
  if (hasErrorMessage(e)) {
    return `error: ${String(e.message)}`;
  }
  return `error: ${String(e)}`;
}
