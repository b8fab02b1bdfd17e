import { describe, expect, it } from "vitest";
import path from "node:path";
import { DEFAULT_DATA_DIR, loadConfig } from "./config.js";
import { InvalidZoneError } from "../domain/errors.js";

describe("loadConfig", () => {
  it("defaults", () => {
    expect(loadConfig({})).toEqual({
      dataDir: path.resolve(DEFAULT_DATA_DIR),
      localZone: "America/Chicago",
    });
  });

  it("reads the environment", () => {
    const config = loadConfig({ SHEETZONE_DATA_DIR: "/tmp/sheets", SHEETZONE_LOCAL_ZONE: "Europe/Stockholm" });
    expect(config).toEqual({ dataDir: "/tmp/sheets", localZone: "Europe/Stockholm" });
  });

  it("rejects unknown zones", () => {
    expect(() => loadConfig({ SHEETZONE_LOCAL_ZONE: "Moon/Base" })).toThrow(InvalidZoneError);
  });
});
