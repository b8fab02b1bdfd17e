/**
 * Domain error model — base and concrete error types.
 * Framework-independent. Thrown synchronously at the offending cell.
 */

/** Optional metadata attached to domain errors. */
export type ErrorMetadata = Record<string, unknown>;

/** Base for all domain errors. Preserves prototype chain for instanceof. */
export class DomainError extends Error {
  readonly metadata: ErrorMetadata | undefined;

  constructor(message: string, metadata?: ErrorMetadata) {
    super(message);
    this.name = this.constructor.name;
    this.metadata = metadata;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Location of a cell. Rows are 1-based data rows; the header is row 0.
 * `column` is absent for record-level failures (e.g. malformed CSV).
 */
export interface CellRef {
  readonly row: number;
  readonly column?: string;
}

function at(cell: CellRef): string {
  return cell.column !== undefined ? `row ${cell.row}, column "${cell.column}"` : `row ${cell.row}`;
}

/** Thrown when a zone identifier cannot be resolved. */
export class InvalidZoneError extends DomainError {
  readonly zone: string;

  constructor(zone: string) {
    super(`Unknown time zone "${zone}"`, { zone });
    this.zone = zone;
  }
}

/** Thrown when a cell value does not fit its column's declared kind. */
export class TypeMismatchError extends DomainError {
  readonly row: number;
  readonly column: string;

  constructor(cell: { row: number; column: string }, expected: string, value: unknown) {
    super(`Expected ${expected} at ${at(cell)}, got ${describeValue(value)}`, {
      row: cell.row,
      column: cell.column,
      expected,
    });
    this.row = cell.row;
    this.column = cell.column;
  }
}

/** Thrown when a persisted cell (text or number) cannot be decoded. */
export class ParseError extends DomainError {
  readonly row: number | undefined;
  readonly column: string | undefined;

  constructor(message: string, value: unknown, cell?: CellRef) {
    super(cell !== undefined ? `${message} at ${at(cell)}` : message, {
      value,
      ...(cell != null && { row: cell.row, column: cell.column }),
    });
    this.row = cell?.row;
    this.column = cell?.column;
  }
}

export type LocalTimeProblem = "gap" | "fold";

/**
 * Thrown when civil fields do not name exactly one instant in a zone:
 * "gap" = skipped by a DST jump, "fold" = repeated when clocks fall back.
 */
export class AmbiguousLocalTimeError extends DomainError {
  readonly zone: string;
  readonly civil: string;
  readonly kind: LocalTimeProblem;

  constructor(zone: string, civil: string, kind: LocalTimeProblem, cell?: CellRef) {
    const what = kind === "gap" ? "does not exist" : "is ambiguous";
    const where = cell !== undefined ? ` at ${at(cell)}` : "";
    super(`Local time ${civil} ${what} in ${zone}${where}`, {
      zone,
      civil,
      kind,
      ...(cell != null && { row: cell.row, column: cell.column }),
    });
    this.zone = zone;
    this.civil = civil;
    this.kind = kind;
  }
}

/** Thrown when an invariant is violated. */
export class InvariantViolation extends DomainError {
  constructor(message: string, metadata?: ErrorMetadata) {
    super(message, metadata);
  }
}

/** Thrown when an entity or resource is not found. */
export class NotFoundError extends DomainError {
  constructor(message: string, metadata?: ErrorMetadata) {
    super(message, metadata);
  }
}

function describeValue(value: unknown): string {
  if (value === null) return "null";
  if (typeof value === "string") return `string ${JSON.stringify(value)}`;
  if (typeof value === "number") return `number ${String(value)}`;
  return typeof value;
}
