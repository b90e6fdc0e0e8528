/**
 * @file Trailer codec: the metadata block at the end of an HTY file
 *
 * The trailer is the single source of truth for file layout. On disk it is a
 * UTF-8 JSON document followed by a signed int32 holding the document's byte
 * length. JSON keys are emitted in sorted order, so equal metadata always
 * encodes to the same bytes.
 */
import type { BlockFile, BlockSink } from "../storage/types";
import { withBlockFile } from "../storage/node";
import { ShortReadError } from "../storage/errors";
import { createWriter, readI32At, type ByteOrder } from "../util/bin";
import { isObject } from "../util/is-object";
import { FLOAT_SIZE, TRAILER_LENGTH_SIZE, resolveEngineOptions } from "../constants/format";
import { CorruptTrailerError } from "./errors";
import { COLUMN_TYPE, type ColumnDescriptor, type EngineOptions, type GroupDescriptor, type Metadata } from "./types";

type WireColumn = { column_name: string; column_type: string };
type WireGroup = { columns: WireColumn[]; num_columns: number; offset: number };
type WireMetadata = { groups: WireGroup[]; num_groups: number; num_rows: number };

function toWire(m: Metadata): WireMetadata {
  return {
    groups: m.groups.map((g) => ({
      columns: g.columns.map((c) => ({ column_name: c.name, column_type: c.type })),
      num_columns: g.numColumns,
      offset: g.offset,
    })),
    num_groups: m.numGroups,
    num_rows: m.numRows,
  };
}

function isCount(x: unknown): x is number {
  return typeof x === "number" && Number.isSafeInteger(x) && x >= 0;
}

function parseColumn(raw: unknown, where: string): ColumnDescriptor {
  if (!isObject(raw)) {
    throw new CorruptTrailerError(`${where} is not an object`);
  }
  const name = raw["column_name"];
  const type = raw["column_type"];
  if (typeof name !== "string") {
    throw new CorruptTrailerError(`${where}.column_name is not a string`);
  }
  if (type !== COLUMN_TYPE) {
    throw new CorruptTrailerError(`${where}.column_type ${JSON.stringify(type)} is not supported`);
  }
  return { name, type };
}

function parseGroup(raw: unknown, where: string): GroupDescriptor {
  if (!isObject(raw)) {
    throw new CorruptTrailerError(`${where} is not an object`);
  }
  const offset = raw["offset"];
  const numColumns = raw["num_columns"];
  // zero-column groups from an empty CSV carry `columns: null`
  const columnsRaw = raw["columns"] === null && numColumns === 0 ? [] : raw["columns"];
  if (!isCount(offset)) {
    throw new CorruptTrailerError(`${where}.offset is not a non-negative integer`);
  }
  if (!isCount(numColumns)) {
    throw new CorruptTrailerError(`${where}.num_columns is not a non-negative integer`);
  }
  if (!Array.isArray(columnsRaw)) {
    throw new CorruptTrailerError(`${where}.columns is not an array`);
  }
  if (columnsRaw.length !== numColumns) {
    throw new CorruptTrailerError(`${where}.num_columns is ${numColumns} but ${columnsRaw.length} columns are listed`);
  }
  const columns = columnsRaw.map((c: unknown, i) => parseColumn(c, `${where}.columns[${i}]`));
  return { offset, numColumns, columns };
}

/** Validate a parsed JSON value as metadata. Throws CorruptTrailerError on any shape error. */
export function parseMetadata(raw: unknown): Metadata {
  if (!isObject(raw)) {
    throw new CorruptTrailerError("metadata is not an object");
  }
  const numRows = raw["num_rows"];
  const numGroups = raw["num_groups"];
  const groupsRaw = raw["groups"];
  if (!isCount(numRows)) {
    throw new CorruptTrailerError("num_rows is not a non-negative integer");
  }
  if (!isCount(numGroups)) {
    throw new CorruptTrailerError("num_groups is not a non-negative integer");
  }
  if (!Array.isArray(groupsRaw)) {
    throw new CorruptTrailerError("groups is not an array");
  }
  if (groupsRaw.length !== numGroups) {
    throw new CorruptTrailerError(`num_groups is ${numGroups} but ${groupsRaw.length} groups are listed`);
  }
  const groups = groupsRaw.map((g: unknown, i) => parseGroup(g, `groups[${i}]`));
  return { numRows, numGroups, groups };
}

/** Serialize metadata to the UTF-8 JSON bytes stored in the trailer. */
export function encodeMetadata(m: Metadata): Uint8Array {
  return new TextEncoder().encode(JSON.stringify(toWire(m)));
}

/** Parse trailer JSON bytes into metadata. */
export function decodeMetadata(bytes: Uint8Array): Metadata {
  const raw: unknown = (() => {
    try {
      return JSON.parse(new TextDecoder("utf-8", { fatal: true }).decode(bytes));
    } catch (e) {
      throw new CorruptTrailerError("metadata is not valid UTF-8 JSON", e);
    }
  })();
  return parseMetadata(raw);
}

/** Trailer bytes for `m`: metadata JSON followed by its int32 length. */
export function encodeTrailer(m: Metadata, order: ByteOrder): Uint8Array {
  const json = encodeMetadata(m);
  const w = createWriter(order);
  w.pushBytes(json);
  w.pushI32(json.length);
  return w.concat();
}

/** Append the trailer for `m` to `sink`. */
export function writeTrailer(sink: BlockSink, m: Metadata, order: ByteOrder): void {
  sink.write(encodeTrailer(m, order));
}

/** Byte length a group block occupies for `numRows` rows. */
export function groupBlockSize(group: GroupDescriptor, numRows: number): number {
  return numRows * group.numColumns * FLOAT_SIZE;
}

function readExact(file: BlockFile, position: number, length: number, what: string): Uint8Array {
  try {
    return file.readAt(position, length);
  } catch (e) {
    if (e instanceof ShortReadError) {
      throw new CorruptTrailerError(`${what} truncated`, e);
    }
    throw e;
  }
}

/**
 * Read and validate the trailer of `file`.
 * Fails with CorruptTrailerError when the length field is negative or larger
 * than the file, the JSON is malformed, or a group block falls outside the
 * data region in front of the metadata.
 */
export function readTrailer(file: BlockFile, order: ByteOrder): Metadata {
  const size = file.size();
  if (size < TRAILER_LENGTH_SIZE) {
    throw new CorruptTrailerError(`file is ${size} bytes, shorter than the length field`);
  }
  const lenBytes = readExact(file, size - TRAILER_LENGTH_SIZE, TRAILER_LENGTH_SIZE, "length field");
  const n = readI32At(lenBytes, 0, order);
  if (n < 0) {
    throw new CorruptTrailerError(`negative metadata length ${n}`);
  }
  const dataEnd = size - TRAILER_LENGTH_SIZE - n;
  if (dataEnd < 0) {
    throw new CorruptTrailerError(`metadata length ${n} exceeds file size ${size}`);
  }
  const metadata = decodeMetadata(readExact(file, dataEnd, n, "metadata block"));
  metadata.groups.forEach((g, i) => {
    const end = g.offset + groupBlockSize(g, metadata.numRows);
    if (end > dataEnd) {
      throw new CorruptTrailerError(`groups[${i}] block ends at ${end}, past the data region end ${dataEnd}`);
    }
  });
  return metadata;
}

/** Open `path`, read its trailer, close it. */
export function readMetadata(path: string, options?: Partial<EngineOptions>): Metadata {
  const { byteOrder } = resolveEngineOptions(options);
  return withBlockFile(path, (file) => readTrailer(file, byteOrder));
}
