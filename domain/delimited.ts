/**
 * Delimited text (CSV) writer and reader.
 *
 * Write: every timestamp cell becomes a UTC OffsetString ("...Z"), whatever
 * the column's display zone. Columns pre-rendered with renderCivilColumn are
 * text and go out as written, with no indicator.
 *
 * Read: OffsetStrings are exact; CivilStrings take the column's ZonePolicy.
 */

import { CsvError } from "csv-parse";
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { formatOffsetUtc } from "./civil.js";
import { ParseError } from "./errors.js";
import { neverReached } from "./validation.js";
import {
  decodeLogical,
  decodeRows,
  decodeTimestampText,
  type CellDecoders,
  type ColumnSchema,
  type ReadOptions,
  type ReadResult,
} from "./schema.js";
import { columnNames, validateTable, type Column, type Table } from "./table.js";

function encodeCell(col: Column, row: number): string {
  switch (col.kind) {
    case "instant":
    case "zoned":
      return formatOffsetUtc(col.values[row]);
    case "text":
      return col.values[row];
    case "logical":
      return col.values[row] ? "TRUE" : "FALSE";
    default:
      return neverReached(col, "Unknown column kind");
  }
}

/** Serialize a table: header row, then one line per row, "\n" endings. */
export function writeDelimited(table: Table): string {
  validateTable(table);
  const records: string[][] = [columnNames(table)];
  for (let r = 0; r < table.rowCount; r++) {
    records.push(table.columns.map((col) => encodeCell(col, r)));
  }
  return stringify(records, { record_delimiter: "unix" });
}

const textDecoders: CellDecoders<string> = {
  // a CSV cell may lack a zone indicator only in civil columns
  needsPolicy: (type) => type === "civil",
  timestamp: (raw, type, policy, cell) => decodeTimestampText(raw, type, policy, cell),
  text: (raw) => raw,
  logical: (raw, cell) => decodeLogical(raw, cell),
};

function isRecordList(value: unknown): value is string[][] {
  return (
    Array.isArray(value) &&
    value.every((rec) => Array.isArray(rec) && rec.every((cell) => typeof cell === "string"))
  );
}

function parseRecords(text: string): string[][] {
  let parsed: unknown;
  try {
    parsed = parse(text, { bom: true });
  } catch (err: unknown) {
    if (err instanceof CsvError) {
      const lines: unknown = err.lines;
      // header is line 1 = row 0
      const row = typeof lines === "number" ? Math.max(lines - 1, 0) : 0;
      throw new ParseError(`Malformed CSV (${err.code})`, text.length, { row });
    }
    throw err;
  }
  if (!isRecordList(parsed)) throw new ParseError("Malformed CSV", text.length, { row: 0 });
  return parsed;
}

/**
 * Parse CSV text under an explicit schema. Zone-less timestamps in "civil"
 * columns use `options.zonePolicy` (DEFAULT_UTC_POLICY when omitted).
 */
export function readDelimited(text: string, schema: ColumnSchema, options?: ReadOptions): ReadResult {
  const [header, ...rows] = parseRecords(text);
  if (header === undefined) throw new ParseError("Missing header row", text, { row: 0 });
  return decodeRows(header, rows, schema, options, textDecoders);
}
