/**
 * Binary spreadsheet (XLSX) writer and reader.
 *
 * Write: a timestamp cell stores the serial date of its clock reading in the
 * column's display zone, plus a date number format. No zone is recorded.
 *
 * Read: serial -> clock reading -> attributed to the column's ZonePolicy zone.
 */

import * as XLSX from "xlsx";
import { ParseError, type CellRef } from "./errors.js";
import { neverReached } from "./validation.js";
import { civilAt } from "./zone.js";
import { civilFromSerial, serialFromCivil } from "./serialDate.js";
import {
  attributeCivil,
  decodeLogical,
  decodeRows,
  decodeTimestampText,
  type CellDecoders,
  type ColumnSchema,
  type ReadOptions,
  type ReadResult,
} from "./schema.js";
import { columnNames, displayZone, validateTable, type Column, type Table } from "./table.js";

export const DEFAULT_SHEET_NAME = "Sheet 1";
export const DATE_FORMAT = "yyyy-mm-dd hh:mm:ss";

export interface WriteSpreadsheetOptions {
  readonly sheetName?: string;
}

export interface ReadSpreadsheetOptions extends ReadOptions {
  /** Worksheet to read. Default: the first one. */
  readonly sheet?: string;
}

function encodeCell(col: Column, row: number): XLSX.CellObject {
  switch (col.kind) {
    case "instant":
    case "zoned":
      return { t: "n", v: serialFromCivil(civilAt(col.values[row], displayZone(col))), z: DATE_FORMAT };
    case "text":
      return { t: "s", v: col.values[row] };
    case "logical":
      return { t: "b", v: col.values[row] };
    default:
      return neverReached(col, "Unknown column kind");
  }
}

function buildSheet(table: Table): XLSX.WorkSheet {
  const sheet: XLSX.WorkSheet = {};
  const names = columnNames(table);
  names.forEach((name, c) => {
    sheet[XLSX.utils.encode_cell({ r: 0, c })] = { t: "s", v: name };
  });
  for (let r = 0; r < table.rowCount; r++) {
    table.columns.forEach((col, c) => {
      sheet[XLSX.utils.encode_cell({ r: r + 1, c })] = encodeCell(col, r);
    });
  }
  sheet["!ref"] = XLSX.utils.encode_range({
    s: { r: 0, c: 0 },
    e: { r: table.rowCount, c: Math.max(names.length - 1, 0) },
  });
  return sheet;
}

/** Serialize a table to an XLSX workbook with a single worksheet. */
export function writeSpreadsheet(table: Table, options: WriteSpreadsheetOptions = {}): Uint8Array {
  validateTable(table);
  const book = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(book, buildSheet(table), options.sheetName ?? DEFAULT_SHEET_NAME);
  const out: unknown = XLSX.write(book, { type: "array", bookType: "xlsx" });
  if (out instanceof Uint8Array) return out;
  if (out instanceof ArrayBuffer) return new Uint8Array(out);
  throw new Error("Spreadsheet writer returned no bytes");
}

/* -------------------------
 * Reading
 * ------------------------- */

/** A grid cell as read; undefined where the sheet has no cell. */
type RawCell = XLSX.CellObject | undefined;

function isCellObject(value: unknown): value is XLSX.CellObject {
  return typeof value === "object" && value !== null && "t" in value && typeof value.t === "string";
}

function cellAt(sheet: XLSX.WorkSheet, r: number, c: number): RawCell {
  const value: unknown = sheet[XLSX.utils.encode_cell({ r, c })];
  return isCellObject(value) ? value : undefined;
}

function cellText(raw: RawCell): string | null {
  if (raw === undefined || raw.t === "z") return "";
  if (raw.t === "s") return String(raw.v);
  if (raw.w !== undefined) return raw.w;
  if (raw.t === "n" || raw.t === "b") return String(raw.v);
  return null;
}

const gridDecoders: CellDecoders<RawCell> = {
  // cells carry no zone at all
  needsPolicy: () => true,
  timestamp: (raw, type, policy, cell) => {
    if (raw !== undefined && raw.t === "n" && typeof raw.v === "number" && Number.isFinite(raw.v)) {
      return attributeCivil(civilFromSerial(raw.v), policy.zone, cell);
    }
    if (raw !== undefined && raw.t === "s" && typeof raw.v === "string") {
      return decodeTimestampText(raw.v, "civil", policy, cell);
    }
    throw new ParseError(`Expected a date serial (${type} column)`, raw?.v, cell);
  },
  text: (raw, cell) => {
    const text = cellText(raw);
    if (text === null) throw new ParseError("Expected a text cell", raw?.v, cell);
    return text;
  },
  logical: (raw, cell) => {
    if (raw !== undefined && raw.t === "b" && typeof raw.v === "boolean") return raw.v;
    if (raw !== undefined && raw.t === "s" && typeof raw.v === "string") return decodeLogical(raw.v, cell);
    throw new ParseError("Expected a boolean cell", raw?.v, cell);
  },
};

function headerOf(sheet: XLSX.WorkSheet, range: XLSX.Range): string[] {
  const names: string[] = [];
  for (let c = range.s.c; c <= range.e.c; c++) {
    const cell: CellRef = { row: 0 };
    const raw = cellAt(sheet, range.s.r, c);
    if (raw === undefined || raw.t !== "s" || typeof raw.v !== "string") {
      throw new ParseError("Header cell is not text", raw?.v, cell);
    }
    names.push(raw.v);
  }
  return names;
}

/**
 * Parse an XLSX workbook under an explicit schema. Every timestamp column is
 * attributed to its ZonePolicy zone (DEFAULT_UTC_POLICY when omitted).
 */
export function readSpreadsheet(
  bytes: Uint8Array,
  schema: ColumnSchema,
  options?: ReadSpreadsheetOptions
): ReadResult {
  let book: XLSX.WorkBook;
  try {
    // serials stay numbers; zone attribution happens below
    book = XLSX.read(bytes, { cellDates: false });
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ParseError(`Unreadable workbook: ${message}`, bytes.byteLength, { row: 0 });
  }

  const sheetName = options?.sheet ?? book.SheetNames[0];
  const sheet = sheetName !== undefined ? book.Sheets[sheetName] : undefined;
  if (sheet === undefined) throw new ParseError(`No worksheet "${sheetName ?? ""}"`, sheetName, { row: 0 });

  const ref = sheet["!ref"];
  if (ref === undefined) throw new ParseError("Missing header row", sheetName, { row: 0 });
  const range = XLSX.utils.decode_range(ref);
  const header = headerOf(sheet, range);

  const rows: RawCell[][] = [];
  for (let r = range.s.r + 1; r <= range.e.r; r++) {
    const row: RawCell[] = [];
    for (let c = range.s.c; c <= range.e.c; c++) {
      row.push(cellAt(sheet, r, c));
    }
    rows.push(row);
  }
  return decodeRows(header, rows, schema, options, gridDecoders);
}
