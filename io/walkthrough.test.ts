import { describe, expect, it, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, existsSync } from "node:fs";
import path from "node:path";
import os from "node:os";
import { FileTableStore } from "./fileTableStore.js";
import { runWalkthrough, sampleTable } from "./walkthrough.js";
import { resolveZone } from "../domain/zone.js";
import { columnZones } from "../domain/table.js";

describe("sampleTable", () => {
  it("holds 13 six-hourly rows in UTC and local display", () => {
    const table = sampleTable("America/Chicago");
    expect(table.rowCount).toBe(13);
    expect(columnZones(table)).toEqual({ dt: "UTC", dt_loc: "America/Chicago" });
  });
});

describe("runWalkthrough", () => {
  let rootDir: string;

  beforeEach(() => {
    rootDir = mkdtempSync(path.join(os.tmpdir(), "walkthrough-"));
  });

  afterEach(() => {
    rmSync(rootDir, { recursive: true, force: true });
  });

  it("reproduces each pitfall and its fix", async () => {
    const lines: string[] = [];
    const report = await runWalkthrough(
      new FileTableStore(rootDir),
      { dataDir: rootDir, localZone: resolveZone("America/Chicago") },
      (line) => lines.push(line)
    );

    const csvLines = report.csvText.trimEnd().split("\n");
    expect(csvLines).toHaveLength(14);
    expect(csvLines[1]).toBe("2018-12-30T00:00:00Z,2018-12-30T00:00:00Z");

    const civilLines = report.civilCsvText.trimEnd().split("\n");
    expect(civilLines[1]).toBe("2018-12-30T00:00:00Z,2018-12-29 18:00:00");

    expect(report.civilDefaultEqual).toEqual(Array(13).fill(false));
    expect(report.civilAssumedEqual).toEqual(Array(13).fill(true));
    expect(report.xlsxDefaultEqual).toEqual(Array(13).fill(false));
    expect(report.xlsxForcedEqual).toEqual(Array(13).fill(true));

    expect(existsSync(path.join(rootDir, "ts.csv"))).toBe(true);
    expect(existsSync(path.join(rootDir, "ts-write.xlsx"))).toBe(true);
    expect(lines).toContain("\n## Sample data\n");
  });
});
