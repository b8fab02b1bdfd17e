import { describe, expect, it } from "vitest";
import * as XLSX from "xlsx";
import { asInstant } from "./core.js";
import { AmbiguousLocalTimeError, InvariantViolation, ParseError, TypeMismatchError } from "./errors.js";
import { assumeZone, DEFAULT_UTC_POLICY } from "./schema.js";
import { DATE_FORMAT, DEFAULT_SHEET_NAME, readSpreadsheet, writeSpreadsheet } from "./spreadsheet.js";
import {
  columnZones,
  compareColumns,
  createTable,
  forceColumnZone,
  getColumn,
  instantColumn,
  logicalColumn,
  textColumn,
  zonedColumn,
  type Table,
} from "./table.js";
import { render } from "./zonedTimestamp.js";
import { UTC } from "./zone.js";

const T0 = asInstant(Date.UTC(2018, 11, 30));

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err: unknown) {
    return err;
  }
  return undefined;
}

function firstSheet(bytes: Uint8Array): XLSX.WorkSheet {
  const book = XLSX.read(bytes, { cellNF: true });
  const name = book.SheetNames[0];
  if (name === undefined) throw new Error("no sheets");
  const sheet = book.Sheets[name];
  if (sheet === undefined) throw new Error("no sheet");
  return sheet;
}

describe("writeSpreadsheet", () => {
  it("rejects a table with no columns", () => {
    expect(() => writeSpreadsheet({ columns: [], rowCount: 0 })).toThrow(InvariantViolation);
  });

  it("stores the local clock reading as a date serial", () => {
    const table = createTable([zonedColumn("dt", "UTC", [T0]), zonedColumn("dt_loc", "America/Chicago", [T0])]);
    const sheet = firstSheet(writeSpreadsheet(table));
    expect(sheet.A1).toMatchObject({ t: "s", v: "dt" });
    expect(sheet.B1).toMatchObject({ t: "s", v: "dt_loc" });
    expect(sheet.A2).toMatchObject({ t: "n", v: 43464, z: DATE_FORMAT });
    expect(sheet.B2).toMatchObject({ t: "n", v: 43463.75, z: DATE_FORMAT });
  });

  it("names the sheet", () => {
    const table = createTable([instantColumn("t", [T0])]);
    expect(XLSX.read(writeSpreadsheet(table)).SheetNames).toEqual([DEFAULT_SHEET_NAME]);
    expect(XLSX.read(writeSpreadsheet(table, { sheetName: "data" })).SheetNames).toEqual(["data"]);
  });

  it("throws TypeMismatchError for a bad cell", () => {
    const values: string[] = JSON.parse('["a", false]');
    const table: Table = { columns: [textColumn("s", values)], rowCount: 2 };
    expect(thrown(() => writeSpreadsheet(table))).toMatchObject({ name: "TypeMismatchError", row: 2, column: "s" });
    expect(thrown(() => writeSpreadsheet(table))).toBeInstanceOf(TypeMismatchError);
  });
});

describe("readSpreadsheet", () => {
  it("loses the zone: local readings come back as UTC", () => {
    const original = createTable([zonedColumn("dt_loc", "America/Chicago", [T0])]);
    const { table, policies } = readSpreadsheet(writeSpreadsheet(original), { dt_loc: "civil" });

    const col = getColumn(table, "dt_loc");
    expect(col).toMatchObject({ kind: "zoned", zone: "UTC" });
    expect(col.values).toEqual([Date.UTC(2018, 11, 29, 18)]);
    expect(render({ instant: asInstant(Date.UTC(2018, 11, 29, 18)), zone: UTC })).toBe("2018-12-29 18:00:00");
    expect(col.values[0]).not.toBe(T0);
    expect(policies.dt_loc).toBe(DEFAULT_UTC_POLICY);
  });

  it("forceColumnZone restores the original instants", () => {
    const original = createTable([zonedColumn("dt", "UTC", [T0]), zonedColumn("dt_loc", "America/Chicago", [T0])]);
    const { table } = readSpreadsheet(writeSpreadsheet(original), { dt: "civil", dt_loc: "civil" });
    expect(compareColumns(table, "dt", "dt_loc")).toEqual([false]);

    const fixed = forceColumnZone(table, "dt_loc", "America/Chicago");
    expect(compareColumns(fixed, "dt", "dt_loc")).toEqual([true]);
    expect(getColumn(fixed, "dt_loc").values).toEqual([T0]);
  });

  it("a policy at read time does the same correction", () => {
    const original = createTable([zonedColumn("dt_loc", "America/Chicago", [T0])]);
    const { table } = readSpreadsheet(writeSpreadsheet(original), { dt_loc: "instant" }, {
      zonePolicy: assumeZone("America/Chicago"),
    });
    expect(getColumn(table, "dt_loc").values).toEqual([T0]);
    expect(columnZones(table).dt_loc).toBe("America/Chicago");
  });

  it("round-trips text and logical columns", () => {
    const original = createTable([textColumn("note", ["a,b", ""]), logicalColumn("ok", [true, false])]);
    const { table } = readSpreadsheet(writeSpreadsheet(original), { note: "text", ok: "logical" });
    expect(getColumn(table, "note").values).toEqual(["a,b", ""]);
    expect(getColumn(table, "ok").values).toEqual([true, false]);
  });

  it("reads text timestamps in timestamp columns", () => {
    const original = createTable([textColumn("t", ["2018-12-29 18:00:00", "2018-12-30T00:00:00Z"])]);
    const { table } = readSpreadsheet(writeSpreadsheet(original), { t: "civil" }, {
      zonePolicy: assumeZone("America/Chicago"),
    });
    expect(getColumn(table, "t").values).toEqual([T0, T0]);
  });

  it("reports non-date cells with coordinates", () => {
    const original = createTable([instantColumn("t", [T0]), logicalColumn("b", [true])]);
    const err = thrown(() => readSpreadsheet(writeSpreadsheet(original), { t: "civil", b: "civil" }));
    expect(err).toBeInstanceOf(ParseError);
    expect(err).toMatchObject({ row: 1, column: "b" });
  });

  it("reports local times skipped by DST", () => {
    const original = createTable([instantColumn("t", [asInstant(Date.UTC(2019, 2, 10, 2, 30))])]);
    const err = thrown(() =>
      readSpreadsheet(writeSpreadsheet(original), { t: "civil" }, { zonePolicy: assumeZone("America/Chicago") })
    );
    expect(err).toBeInstanceOf(AmbiguousLocalTimeError);
    expect(err).toMatchObject({ kind: "gap", metadata: { row: 1, column: "t" } });
  });

  it("selects a sheet by name", () => {
    const bytes = writeSpreadsheet(createTable([instantColumn("t", [T0])]), { sheetName: "data" });
    expect(getColumn(readSpreadsheet(bytes, { t: "civil" }, { sheet: "data" }).table, "t").values).toEqual([T0]);
    expect(() => readSpreadsheet(bytes, { t: "civil" }, { sheet: "missing" })).toThrow(ParseError);
  });

  it("checks the header against the schema", () => {
    const bytes = writeSpreadsheet(createTable([instantColumn("t", [T0])]));
    expect(thrown(() => readSpreadsheet(bytes, { u: "civil" }))).toMatchObject({ row: 0, column: "t" });
  });
});
