/**
 * Plain-text table rendering for the walkthrough and diagnostics.
 * Timestamps are shown as CivilStrings in their column's display zone.
 */

import { formatCivil } from "./civil.js";
import { neverReached } from "./validation.js";
import { civilAt } from "./zone.js";
import { displayZone, type Column, type Table } from "./table.js";

function typeTag(col: Column): string {
  switch (col.kind) {
    case "instant":
    case "zoned":
      return "<dttm>";
    case "text":
      return "<chr>";
    case "logical":
      return "<lgl>";
    default:
      return neverReached(col, "Unknown column kind");
  }
}

function cellStrings(col: Column): string[] {
  switch (col.kind) {
    case "instant":
    case "zoned": {
      const zone = displayZone(col);
      return col.values.map((v) => formatCivil(civilAt(v, zone)));
    }
    case "text":
      return col.values.slice();
    case "logical":
      return col.values.map((v) => (v ? "TRUE" : "FALSE"));
    default:
      return neverReached(col, "Unknown column kind");
  }
}

/**
 * # A table: 2 x 2
 *   dt                  flag
 *   <dttm>              <lgl>
 * 1 2018-12-30 00:00:00 TRUE
 * 2 2018-12-30 06:00:00 FALSE
 */
export function formatTable(table: Table): string {
  const labelWidth = String(table.rowCount).length;
  const columns = table.columns.map((col) => {
    const tag = typeTag(col);
    const cells = cellStrings(col);
    const width = Math.max(col.name.length, tag.length, ...cells.map((c) => c.length));
    return { name: col.name, tag, cells, width };
  });

  const line = (label: string, values: string[]): string =>
    [label.padStart(labelWidth), ...values.map((v, i) => v.padEnd(columns[i]?.width ?? 0))].join(" ").trimEnd();

  const lines = [
    `# A table: ${table.rowCount} x ${table.columns.length}`,
    line("", columns.map((c) => c.name)),
    line("", columns.map((c) => c.tag)),
  ];
  for (let r = 0; r < table.rowCount; r++) {
    lines.push(line(String(r + 1), columns.map((c) => c.cells[r] ?? "")));
  }
  return lines.join("\n");
}

/** One line per timestamp column: "name: zone". */
export function formatZones(table: Table): string {
  return table.columns
    .flatMap((col) => (col.kind === "instant" || col.kind === "zoned" ? [`${col.name}: ${displayZone(col)}`] : []))
    .join("\n");
}
