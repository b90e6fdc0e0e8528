/**
 * @file HTY error types
 * Every failure the engine raises is terminal for the operation: the causes
 * are structural (bad input, bad file), so nothing here is retried.
 */
/* eslint-disable no-restricted-syntax -- Error classes are idiomatic for exceptions and enable instanceof checks */

export type HtyErrorKind =
  | "IOUnavailable"
  | "CorruptTrailer"
  | "ColumnNotFound"
  | "CrossGroupQuery"
  | "EmptyColumnSet"
  | "RowShapeMismatch"
  | "NoRowsProvided"
  | "InvalidPredicateOperator"
  | "InvalidDestination";

/** Common base so callers can branch on `kind` without instanceof chains. */
export class HtyError extends Error {
  readonly kind: HtyErrorKind;
  constructor(kind: HtyErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.kind = kind;
    this.name = "HtyError";
  }
}

/** Thrown when a file cannot be opened, read, written or renamed. */
export class IOUnavailableError extends HtyError {
  readonly path: string;
  constructor(path: string, action: string, cause?: unknown) {
    const detail = cause instanceof Error ? `: ${cause.message}` : "";
    super("IOUnavailable", `cannot ${action} ${path}${detail}`, { cause });
    this.name = "IOUnavailableError";
    this.path = path;
  }
}

/** Thrown when the trailer length or the metadata it bounds is invalid. */
export class CorruptTrailerError extends HtyError {
  constructor(reason: string, cause?: unknown) {
    super("CorruptTrailer", `corrupt trailer: ${reason}`, { cause });
    this.name = "CorruptTrailerError";
  }
}

/** Thrown when no column carries the requested name (or the name is empty). */
export class ColumnNotFoundError extends HtyError {
  readonly column: string;
  constructor(column: string) {
    super("ColumnNotFound", column === "" ? "column name is empty" : `column not found: ${column}`);
    this.name = "ColumnNotFoundError";
    this.column = column;
  }
}

/** Thrown when the columns of one query live in more than one group. */
export class CrossGroupQueryError extends HtyError {
  readonly groups: ReadonlyArray<{ column: string; groupIndex: number }>;
  constructor(groups: ReadonlyArray<{ column: string; groupIndex: number }>) {
    const where = groups.map((g) => `${g.column}@${g.groupIndex}`).join(", ");
    super("CrossGroupQuery", `columns span more than one group: ${where}`);
    this.name = "CrossGroupQueryError";
    this.groups = groups;
  }
}

/** Thrown when a multi-column operation is given no column names. */
export class EmptyColumnSetError extends HtyError {
  constructor() {
    super("EmptyColumnSet", "no columns requested");
    this.name = "EmptyColumnSetError";
  }
}

/** Thrown when an appended row does not carry one value per column. */
export class RowShapeMismatchError extends HtyError {
  readonly rowIndex: number;
  readonly expected: number;
  readonly actual: number;
  constructor(rowIndex: number, expected: number, actual: number) {
    super("RowShapeMismatch", `row ${rowIndex} has ${actual} values, expected ${expected}`);
    this.name = "RowShapeMismatchError";
    this.rowIndex = rowIndex;
    this.expected = expected;
    this.actual = actual;
  }
}

/** Thrown when an append is requested with an empty row batch. */
export class NoRowsProvidedError extends HtyError {
  constructor() {
    super("NoRowsProvided", "no rows to append");
    this.name = "NoRowsProvidedError";
  }
}

/** Thrown for a relational operator outside the supported set. */
export class InvalidPredicateOperatorError extends HtyError {
  readonly operator: string;
  constructor(operator: string) {
    super("InvalidPredicateOperator", `invalid predicate operator: ${operator}`);
    this.name = "InvalidPredicateOperatorError";
    this.operator = operator;
  }
}

/** Thrown when an append would overwrite its own source file. */
export class InvalidDestinationError extends HtyError {
  constructor(path: string) {
    super("InvalidDestination", `destination must differ from source: ${path}`);
    this.name = "InvalidDestinationError";
  }
}

/** Narrow unknown to an HtyError. */
export function isHtyError(e: unknown): e is HtyError {
  return e instanceof HtyError;
}
