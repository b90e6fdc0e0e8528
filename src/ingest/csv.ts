/**
 * @file CSV → HTY producer
 *
 * Emits a single group holding every column at offset 0. The first non-blank
 * line is a header when any of its fields is not a number; otherwise columns
 * are named `column_1..column_n` and that line is data. Cells that are not
 * numbers (or are missing) are stored as 0, so a blank line inside the file
 * is a row of zeros. Only the final newline ends the input without a row.
 */
import { readFileSync } from "node:fs";
import { writeFileAtomic } from "../storage/node";
import { createMemorySink } from "../storage/memory";
import type { BlockSink } from "../storage/types";
import { createWriter, type ByteOrder } from "../util/bin";
import { resolveEngineOptions } from "../constants/format";
import { IOUnavailableError } from "../hty/errors";
import { writeTrailer } from "../hty/trailer";
import { COLUMN_TYPE, type EngineOptions, type Metadata } from "../hty/types";

const NUMBER_PATTERN = /^[-+]?[0-9]*\.?[0-9]+([eE][-+]?[0-9]+)?$/;

/** Signed decimal with optional fraction and exponent, nothing else (no spaces). */
export function isNumericToken(s: string): boolean {
  return NUMBER_PATTERN.test(s);
}

/** Split one line on commas; a single trailing empty field is dropped. */
export function splitFields(line: string): string[] {
  if (line === "") {
    return [];
  }
  const parts = line.split(",");
  return line.endsWith(",") ? parts.slice(0, -1) : parts;
}

/** Lines of `text` with CR stripped; a trailing newline does not start another line. */
export function splitLines(text: string): string[] {
  const lines = text.split("\n").map((l) => (l.endsWith("\r") ? l.slice(0, -1) : l));
  return text.endsWith("\n") || text === "" ? lines.slice(0, -1) : lines;
}

export type CsvTable = {
  header: string[];
  /** One entry per data row, exactly `header.length` wide. */
  rows: number[][];
};

function toRow(fields: readonly string[], width: number): number[] {
  return Array.from({ length: width }, (_, i) => {
    const cell = fields[i] ?? "";
    return isNumericToken(cell) ? Number(cell) : 0;
  });
}

/** Parse CSV text into a numeric table. */
export function parseCsv(text: string): CsvTable {
  const [first, ...rest] = splitLines(text);
  if (first === undefined) {
    return { header: [], rows: [] };
  }
  const firstFields = splitFields(first);
  const isHeader = firstFields.some((f) => !isNumericToken(f));
  const header = isHeader ? firstFields : firstFields.map((_, i) => `column_${i + 1}`);
  const dataLines = isHeader ? rest : [first, ...rest];
  return { header, rows: dataLines.map((l) => toRow(splitFields(l), header.length)) };
}

/** Metadata of a single-group file holding `table`. */
export function tableMetadata(table: CsvTable): Metadata {
  return {
    numRows: table.rows.length,
    numGroups: 1,
    groups: [
      {
        offset: 0,
        numColumns: table.header.length,
        columns: table.header.map((name) => ({ name, type: COLUMN_TYPE })),
      },
    ],
  };
}

function writeTable(sink: BlockSink, table: CsvTable, order: ByteOrder): Metadata {
  const w = createWriter(order);
  for (const row of table.rows) {
    for (const v of row) {
      w.pushF32(v);
    }
  }
  sink.write(w.concat());
  const metadata = tableMetadata(table);
  writeTrailer(sink, metadata, order);
  return metadata;
}

/** Encode CSV text as HTY file bytes. */
export function convertCsv(text: string, options?: Partial<EngineOptions>): Uint8Array {
  const { byteOrder } = resolveEngineOptions(options);
  const sink = createMemorySink();
  writeTable(sink, parseCsv(text), byteOrder);
  return sink.bytes();
}

function readText(path: string): string {
  try {
    return readFileSync(path, "utf8");
  } catch (e) {
    throw new IOUnavailableError(path, "read", e);
  }
}

/** Convert the CSV file at `csvPath` into an HTY file at `htyPath`. */
export function convertCsvFile(csvPath: string, htyPath: string, options?: Partial<EngineOptions>): Metadata {
  const { byteOrder } = resolveEngineOptions(options);
  const table = parseCsv(readText(csvPath));
  return writeFileAtomic(htyPath, (sink) => writeTable(sink, table, byteOrder));
}

/**
 * Parse header-less CSV rows for appending. Unlike ingestion, a cell that is
 * not a number is an error here, and blank lines are skipped.
 */
export function parseNumericRows(text: string): number[][] {
  return splitLines(text)
    .filter((line) => line !== "")
    .map((line, r) =>
      splitFields(line).map((cell, c) => {
        if (!isNumericToken(cell)) {
          throw new Error(`row ${r + 1}, field ${c + 1}: ${JSON.stringify(cell)} is not a number`);
        }
        return Number(cell);
      }),
    );
}

/** Read and parse append rows from a CSV file. */
export function readNumericRowsFile(path: string): number[][] {
  return parseNumericRows(readText(path));
}
