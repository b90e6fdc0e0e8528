/**
 * @file Public entrypoint (single canonical import)
 * @remarks
 * Format codec, query engine and append engine for HTY files. Every function
 * that takes a path opens the file, does its work, and closes it before
 * returning; nothing is cached between calls.
 */

/**
 * Data model
 * @public
 */
export type { Metadata, GroupDescriptor, ColumnDescriptor, ColumnLocation, ColumnValues, EngineOptions } from "./hty/types";
export { COLUMN_TYPE } from "./hty/types";
export type { ByteOrder } from "./util/bin";

/**
 * Trailer codec
 * @public
 */
export {
  readTrailer,
  writeTrailer,
  readMetadata,
  encodeTrailer,
  encodeMetadata,
  decodeMetadata,
  parseMetadata,
  groupBlockSize,
} from "./hty/trailer";

/**
 * Column locator and row-group reader
 * @public
 */
export { locate, locateAllSameGroup, buildColumnIndex } from "./hty/locate";
export type { ColumnIndex, GroupSelection } from "./hty/locate";
export { cellOffset, readCell, readGroupBlock, readRowSpan } from "./hty/row_group";
export type { RowSpan } from "./hty/row_group";

/**
 * Query engine
 * @public
 */
export { project, filter, projectAndFilter, projectFile, filterFile, projectAndFilterFile, scanGroup } from "./hty/query";
export type { Condition, RowCursor } from "./hty/query";
export { parseOperator, compilePredicate, OPERATORS } from "./hty/predicate";
export type { Operator, ValuePredicate } from "./hty/predicate";

/**
 * Append engine
 * @public
 */
export { addRows, appendRows, planAppend, validateRows, totalColumns, writeAppended } from "./hty/append";
export type { Row } from "./hty/append";

/**
 * CSV producer and output formatting
 * @public
 */
export { convertCsv, convertCsvFile, parseCsv, parseNumericRows, isNumericToken } from "./ingest/csv";
export type { CsvTable } from "./ingest/csv";
export { formatValue } from "./output/format";

/**
 * Storage adapters
 * @public
 */
export { openBlockFile, withBlockFile, writeFileAtomic } from "./storage/node";
export { createMemoryBlockFile, createMemorySink } from "./storage/memory";
export type { BlockFile, BlockSink } from "./storage/types";

/**
 * Errors
 * @public
 */
export {
  HtyError,
  IOUnavailableError,
  CorruptTrailerError,
  ColumnNotFoundError,
  CrossGroupQueryError,
  EmptyColumnSetError,
  RowShapeMismatchError,
  NoRowsProvidedError,
  InvalidPredicateOperatorError,
  InvalidDestinationError,
  isHtyError,
} from "./hty/errors";
export type { HtyErrorKind } from "./hty/errors";
export { defaultEngineOptions, resolveEngineOptions, nativeByteOrder } from "./constants/format";
