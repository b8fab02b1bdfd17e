/**
 * Read-side configuration shared by both formats:
 * declared column types, zone policies, cell decoding.
 */

import type { Instant, ZoneId } from "./core.js";
import { hasZoneIndicator, parseCivil, parseOffset, type CivilFields } from "./civil.js";
import { AmbiguousLocalTimeError, ParseError, type CellRef } from "./errors.js";
import { neverReached } from "./validation.js";
import { instantFromCivil, resolveZone, UTC } from "./zone.js";
import { createTable, logicalColumn, textColumn, zonedColumn, type Column, type Table } from "./table.js";

/**
 * Declared type of a persisted column.
 * - instant: timestamps that must carry a zone indicator
 * - civil:   timestamps that may lack one; zone comes from the policy
 * - text:    kept as-is
 * - logical: TRUE/FALSE
 */
export type ColumnType = "instant" | "civil" | "text" | "logical";

export type ColumnSchema = Readonly<Record<string, ColumnType>>;

/** How zone-less timestamps are attributed to a zone. */
export type ZonePolicy =
  | { readonly kind: "assume-zone"; readonly zone: ZoneId }
  | { readonly kind: "default-utc"; readonly zone: ZoneId };

/** Applied when a caller names no policy. Wrong for data authored outside UTC. */
export const DEFAULT_UTC_POLICY: ZonePolicy = { kind: "default-utc", zone: UTC };

export function assumeZone(zone: string): ZonePolicy {
  return { kind: "assume-zone", zone: resolveZone(zone) };
}

export interface ReadOptions {
  /** Policy for every timestamp column without its own entry. Default: DEFAULT_UTC_POLICY. */
  readonly zonePolicy?: ZonePolicy;
  readonly columnPolicies?: Readonly<Record<string, ZonePolicy>>;
}

export interface ReadResult {
  readonly table: Table;
  /** Policy applied per column that needed one; shows when the default was used. */
  readonly policies: Readonly<Record<string, ZonePolicy>>;
}

export function policyFor(options: ReadOptions | undefined, column: string): ZonePolicy {
  return options?.columnPolicies?.[column] ?? options?.zonePolicy ?? DEFAULT_UTC_POLICY;
}

/** Header must name each declared column exactly once and nothing else. */
export function checkHeader(header: readonly string[], schema: ColumnSchema): void {
  const seen = new Set<string>();
  for (const name of header) {
    if (seen.has(name)) throw new ParseError("Duplicate column", name, { row: 0, column: name });
    seen.add(name);
    if (!Object.hasOwn(schema, name)) {
      throw new ParseError("Column has no declared type", name, { row: 0, column: name });
    }
  }
  for (const name of Object.keys(schema)) {
    if (!seen.has(name)) throw new ParseError("Declared column missing from header", name, { row: 0, column: name });
  }
}

/** Resolve civil fields in a zone; DST problems are reported against the cell. */
export function attributeCivil(fields: CivilFields, zone: ZoneId, cell: CellRef): Instant {
  try {
    return instantFromCivil(fields, zone);
  } catch (err: unknown) {
    if (err instanceof AmbiguousLocalTimeError) {
      throw new AmbiguousLocalTimeError(err.zone, err.civil, err.kind, cell);
    }
    throw err;
  }
}

/**
 * Decode a timestamp written as text. OffsetStrings are exact; CivilStrings
 * are attributed to the policy zone, unless the column is "instant".
 */
export function decodeTimestampText(
  text: string,
  type: "instant" | "civil",
  policy: ZonePolicy,
  cell: CellRef
): Instant {
  const exact = parseOffset(text);
  if (exact !== null) return exact;
  if (hasZoneIndicator(text)) throw new ParseError("Invalid offset timestamp", text, cell);
  if (type === "instant") throw new ParseError("Expected a timestamp with a zone indicator", text, cell);
  const fields = parseCivil(text);
  if (fields === null) throw new ParseError("Malformed timestamp", text, cell);
  return attributeCivil(fields, policy.zone, cell);
}

export function decodeLogical(text: string, cell: CellRef): boolean {
  switch (text.trim().toUpperCase()) {
    case "TRUE":
      return true;
    case "FALSE":
      return false;
    default:
      throw new ParseError("Expected TRUE or FALSE", text, cell);
  }
}

/** Format-specific decoding of one raw cell per declared type. */
export interface CellDecoders<Raw> {
  /** Whether zone-less timestamps of this type occur in the format. */
  needsPolicy(type: "instant" | "civil"): boolean;
  timestamp(raw: Raw, type: "instant" | "civil", policy: ZonePolicy, cell: CellRef): Instant;
  text(raw: Raw, cell: CellRef): string;
  logical(raw: Raw, cell: CellRef): boolean;
}

type Sink =
  | { readonly type: "instant" | "civil"; readonly policy: ZonePolicy; readonly zone: ZoneId; readonly values: Instant[] }
  | { readonly type: "text"; readonly values: string[] }
  | { readonly type: "logical"; readonly values: boolean[] };

function toColumn(name: string, sink: Sink): Column {
  switch (sink.type) {
    case "instant":
    case "civil":
      return zonedColumn(name, sink.zone, sink.values);
    case "text":
      return textColumn(name, sink.values);
    case "logical":
      return logicalColumn(name, sink.values);
    default:
      return neverReached(sink, "Unknown column type");
  }
}

/**
 * Decode data rows under a schema. Rows are visited in order, cells left to
 * right; the first bad cell throws. `rows[i]` is data row i + 1.
 */
export function decodeRows<Raw>(
  header: readonly string[],
  rows: readonly (readonly Raw[])[],
  schema: ColumnSchema,
  options: ReadOptions | undefined,
  decoders: CellDecoders<Raw>
): ReadResult {
  checkHeader(header, schema);

  const policies: Record<string, ZonePolicy> = {};
  const sinks = header.map((name): Sink => {
    const type = schema[name] ?? "text";
    if (type === "text" || type === "logical") return { type, values: [] };
    if (!decoders.needsPolicy(type)) return { type, policy: DEFAULT_UTC_POLICY, zone: UTC, values: [] };
    const policy = policyFor(options, name);
    policies[name] = policy;
    return { type, policy, zone: policy.zone, values: [] };
  });

  rows.forEach((raw, i) => {
    if (raw.length !== header.length) {
      throw new ParseError(`Expected ${header.length} cells, found ${raw.length}`, raw.length, { row: i + 1 });
    }
    sinks.forEach((sink, c) => {
      const cell: CellRef = { row: i + 1, column: header[c] };
      const value = raw[c];
      switch (sink.type) {
        case "instant":
        case "civil":
          sink.values.push(decoders.timestamp(value, sink.type, sink.policy, cell));
          break;
        case "text":
          sink.values.push(decoders.text(value, cell));
          break;
        case "logical":
          sink.values.push(decoders.logical(value, cell));
          break;
        default:
          neverReached(sink, "Unknown column type");
      }
    });
  });

  const table = createTable(sinks.map((sink, c) => toColumn(header[c], sink)));
  return { table, policies };
}
