/**
 * Timestamps through CSV and XLSX: the round trips that lose a column's zone,
 * and the reads that restore it. Logs each step; returns the comparisons.
 */

import { asInstant, hours } from "../domain/core.js";
import { civilToUtcMs } from "../domain/civil.js";
import { formatTable, formatZones } from "../domain/format.js";
import { assumeZone, type ColumnSchema } from "../domain/schema.js";
import {
  compareColumns,
  createTable,
  forceColumnZone,
  renderCivilColumn,
  withColumnZone,
  withComparison,
  zonedColumn,
  type Table,
} from "../domain/table.js";
import { instantSequence } from "../domain/zonedTimestamp.js";
import { UTC } from "../domain/zone.js";
import type { WalkthroughConfig } from "./config.js";
import type { FileTableStore } from "./fileTableStore.js";

export type Log = (line: string) => void;

export interface WalkthroughReport {
  /** CSV text with both columns as timestamps (both collapse to UTC). */
  readonly csvText: string;
  /** CSV text with the local column pre-rendered as CivilStrings. */
  readonly civilCsvText: string;
  /** dt == dt_loc after reading civil text with the default UTC policy. */
  readonly civilDefaultEqual: boolean[];
  /** dt == dt_loc after reading civil text assuming the local zone. */
  readonly civilAssumedEqual: boolean[];
  /** dt == dt_loc after reading XLSX with the default UTC policy. */
  readonly xlsxDefaultEqual: boolean[];
  /** dt == dt_loc after forcing the XLSX column back into the local zone. */
  readonly xlsxForcedEqual: boolean[];
}

const TIMESTAMPS: ColumnSchema = { dt: "instant", dt_loc: "instant" };
const CIVIL_LOCAL: ColumnSchema = { dt: "instant", dt_loc: "civil" };
const SPREADSHEET: ColumnSchema = { dt: "civil", dt_loc: "civil" };

/** Every 6 hours from 2018-12-30 to 2019-01-02 (UTC), shown in UTC and locally. */
export function sampleTable(localZone: string): Table {
  const from = asInstant(civilToUtcMs({ year: 2018, month: 12, day: 30, hour: 0, minute: 0, second: 0, millisecond: 0 }));
  const to = asInstant(civilToUtcMs({ year: 2019, month: 1, day: 2, hour: 0, minute: 0, second: 0, millisecond: 0 }));
  const dt = instantSequence(from, to, hours(6));
  return createTable([zonedColumn("dt", UTC, dt), zonedColumn("dt_loc", localZone, dt)]);
}

export async function runWalkthrough(
  store: FileTableStore,
  config: WalkthroughConfig,
  log: Log = console.info
): Promise<WalkthroughReport> {
  const zone = config.localZone;
  const section = (title: string): void => log(`\n## ${title}\n`);

  section("Sample data");
  const df = sampleTable(zone);
  log(formatTable(df));

  section("CSV: timestamps are written in UTC");
  await store.writeCsv("ts", df);
  const csvText = await store.readRaw("ts.csv");
  log(csvText);
  const readBack = (await store.readCsv("ts", TIMESTAMPS)).table;
  log(formatTable(readBack));
  log(formatZones(readBack));

  section(`CSV: re-tag dt_loc as ${zone}`);
  log(formatTable(withColumnZone(readBack, "dt_loc", zone)));

  section("CSV: dt_loc pre-rendered as local clock text");
  await store.writeCsv("ts", renderCivilColumn(df, "dt_loc"));
  const civilCsvText = await store.readRaw("ts.csv");
  log(civilCsvText);

  const civilDefault = (await store.readCsv("ts", CIVIL_LOCAL)).table;
  log("Read with the default policy (zone-less text taken as UTC):");
  log(formatTable(withComparison(civilDefault, "is_equal", "dt", "dt_loc")));

  const civilAssumed = (await store.readCsv("ts", CIVIL_LOCAL, { columnPolicies: { dt_loc: assumeZone(zone) } })).table;
  log(`Read assuming ${zone}:`);
  log(formatTable(withComparison(civilAssumed, "is_equal", "dt", "dt_loc")));
  log(formatZones(civilAssumed));

  section("XLSX: local clock readings with no zone");
  await store.writeXlsx("ts-write", df);
  const xlsxDefault = (await store.readXlsx("ts-write", SPREADSHEET)).table;
  log(formatTable(xlsxDefault));
  log(formatZones(xlsxDefault));

  section(`XLSX: force dt_loc into ${zone}`);
  const xlsxForced = forceColumnZone(xlsxDefault, "dt_loc", zone);
  log(formatTable(withComparison(xlsxForced, "is_equal", "dt", "dt_loc")));
  log(formatZones(xlsxForced));

  return {
    csvText,
    civilCsvText,
    civilDefaultEqual: compareColumns(civilDefault, "dt", "dt_loc"),
    civilAssumedEqual: compareColumns(civilAssumed, "dt", "dt_loc"),
    xlsxDefaultEqual: compareColumns(xlsxDefault, "dt", "dt_loc"),
    xlsxForcedEqual: compareColumns(xlsxForced, "dt", "dt_loc"),
  };
}
