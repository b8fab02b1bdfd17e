/**
 * Table model — named, position-aligned columns.
 * Immutable: every operation returns a new Table.
 */

import { isInstantValue, type Instant, type ZoneId } from "./core.js";
import { formatCivil } from "./civil.js";
import { InvariantViolation, NotFoundError, TypeMismatchError } from "./errors.js";
import { invariant, neverReached } from "./validation.js";
import { civilAt, resolveZone, UTC } from "./zone.js";
import { forceZone, type ZonedTimestamp } from "./zonedTimestamp.js";

/** Instants with no display zone; rendered as UTC. */
export interface InstantColumn {
  readonly kind: "instant";
  readonly name: string;
  readonly values: readonly Instant[];
}

/** Instants with a column-level display zone (every cell is a ZonedTimestamp). */
export interface ZonedColumn {
  readonly kind: "zoned";
  readonly name: string;
  readonly zone: ZoneId;
  readonly values: readonly Instant[];
}

export interface TextColumn {
  readonly kind: "text";
  readonly name: string;
  readonly values: readonly string[];
}

/** Per-row comparison results. */
export interface LogicalColumn {
  readonly kind: "logical";
  readonly name: string;
  readonly values: readonly boolean[];
}

export type Column = InstantColumn | ZonedColumn | TextColumn | LogicalColumn;
export type ColumnKind = Column["kind"];
export type TimestampColumn = InstantColumn | ZonedColumn;

export interface Table {
  readonly columns: readonly Column[];
  readonly rowCount: number;
}

/* -------------------------
 * Column constructors
 * ------------------------- */

export function instantColumn(name: string, values: readonly Instant[]): InstantColumn {
  return { kind: "instant", name, values };
}

export function zonedColumn(name: string, zone: string, values: readonly Instant[]): ZonedColumn {
  return { kind: "zoned", name, zone: resolveZone(zone), values };
}

export function textColumn(name: string, values: readonly string[]): TextColumn {
  return { kind: "text", name, values };
}

export function logicalColumn(name: string, values: readonly boolean[]): LogicalColumn {
  return { kind: "logical", name, values };
}

/* -------------------------
 * Validation
 * ------------------------- */

const EXPECTED: Record<ColumnKind, string> = {
  instant: "an integer millisecond instant",
  zoned: "an integer millisecond instant",
  text: "a string",
  logical: "a boolean",
};

function cellFits(kind: ColumnKind, value: unknown): boolean {
  switch (kind) {
    case "instant":
    case "zoned":
      return isInstantValue(value);
    case "text":
      return typeof value === "string";
    case "logical":
      return typeof value === "boolean";
    default:
      return neverReached(kind, "Unknown column kind");
  }
}

/**
 * Check shape and every cell. Cells are visited row by row, left to right;
 * the first misfit throws TypeMismatchError.
 */
export function validateTable(table: Table): void {
  invariant(table.columns.length > 0, "A table needs at least one column");
  const seen = new Set<string>();
  for (const col of table.columns) {
    if (seen.has(col.name)) throw new InvariantViolation(`Duplicate column "${col.name}"`, { column: col.name });
    seen.add(col.name);
    if (col.values.length !== table.rowCount) {
      throw new InvariantViolation(`Column "${col.name}" has ${col.values.length} rows, expected ${table.rowCount}`, {
        column: col.name,
      });
    }
  }
  for (let r = 0; r < table.rowCount; r++) {
    for (const col of table.columns) {
      const value: unknown = col.values[r];
      if (!cellFits(col.kind, value)) {
        throw new TypeMismatchError({ row: r + 1, column: col.name }, EXPECTED[col.kind], value);
      }
    }
  }
}

export function createTable(columns: readonly Column[]): Table {
  const table: Table = { columns, rowCount: columns[0]?.values.length ?? 0 };
  validateTable(table);
  return table;
}

/* -------------------------
 * Access
 * ------------------------- */

export function columnNames(table: Table): string[] {
  return table.columns.map((c) => c.name);
}

export function getColumn(table: Table, name: string): Column {
  const col = table.columns.find((c) => c.name === name);
  if (!col) throw new NotFoundError(`No column "${name}"`, { column: name });
  return col;
}

export function isTimestampColumn(col: Column): col is TimestampColumn {
  return col.kind === "instant" || col.kind === "zoned";
}

/** Display zone of a timestamp column (UTC for zone-less instants). */
export function displayZone(col: TimestampColumn): ZoneId {
  return col.kind === "zoned" ? col.zone : UTC;
}

export function getTimestampColumn(table: Table, name: string): TimestampColumn {
  const col = getColumn(table, name);
  if (!isTimestampColumn(col)) {
    throw new TypeMismatchError({ row: 0, column: name }, "a timestamp column", col.kind);
  }
  return col;
}

export function zonedValues(col: TimestampColumn): ZonedTimestamp[] {
  const zone = displayZone(col);
  return col.values.map((instant) => ({ instant, zone }));
}

/** Display zone per column; null for columns that hold no timestamps. */
export function columnZones(table: Table): Record<string, ZoneId | null> {
  const out: Record<string, ZoneId | null> = {};
  for (const col of table.columns) out[col.name] = isTimestampColumn(col) ? displayZone(col) : null;
  return out;
}

/* -------------------------
 * Transformations
 * ------------------------- */

/** Replace the column with the same name, or append it. */
export function withColumn(table: Table, column: Column): Table {
  const exists = table.columns.some((c) => c.name === column.name);
  const columns = exists
    ? table.columns.map((c) => (c.name === column.name ? column : c))
    : [...table.columns, column];
  return createTable(columns);
}

/** Re-tag a column for display in another zone; instants unchanged. */
export function withColumnZone(table: Table, name: string, zone: string): Table {
  const col = getTimestampColumn(table, name);
  return withColumn(table, zonedColumn(col.name, zone, col.values));
}

/** Keep each cell's clock reading, attribute it to another zone; instants change. */
export function forceColumnZone(table: Table, name: string, zone: string): Table {
  const col = getTimestampColumn(table, name);
  const values = zonedValues(col).map((zt) => forceZone(zt, zone).instant);
  return withColumn(table, zonedColumn(col.name, zone, values));
}

/** Turn a timestamp column into CivilStrings of its display zone (`%F %T`). */
export function renderCivilColumn(table: Table, name: string): Table {
  const col = getTimestampColumn(table, name);
  const zone = displayZone(col);
  return withColumn(table, textColumn(col.name, col.values.map((v) => formatCivil(civilAt(v, zone)))));
}

/** Row-wise instant equality of two timestamp columns. */
export function compareColumns(table: Table, a: string, b: string): boolean[] {
  const left = getTimestampColumn(table, a);
  const right = getTimestampColumn(table, b);
  return left.values.map((v, i) => v === right.values[i]);
}

/** Append (or replace) a logical column holding compareColumns(a, b). */
export function withComparison(table: Table, name: string, a: string, b: string): Table {
  return withColumn(table, logicalColumn(name, compareColumns(table, a, b)));
}
