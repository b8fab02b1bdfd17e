import { describe, expect, it } from "vitest";
import { asInstant } from "./core.js";
import {
  civilFromSerial,
  fromSerial,
  SERIAL_EPOCH_MS,
  serialFromCivil,
  toSerial,
  UNIX_EPOCH_SERIAL,
} from "./serialDate.js";

describe("serial epoch", () => {
  it("day 0 is 1899-12-30", () => {
    expect(SERIAL_EPOCH_MS).toBe(Date.UTC(1899, 11, 30));
    expect(fromSerial(0)).toBe(Date.UTC(1899, 11, 30));
  });

  it("day 61 is 1900-03-01 (the fictitious 1900-02-29 is skipped)", () => {
    expect(fromSerial(61)).toBe(Date.UTC(1900, 2, 1));
  });

  it("the Unix epoch is serial 25569", () => {
    expect(UNIX_EPOCH_SERIAL).toBe(25569);
    expect(toSerial(asInstant(0))).toBe(25569);
  });
});

describe("toSerial / fromSerial", () => {
  it("fraction of day is the time of day", () => {
    expect(toSerial(asInstant(Date.UTC(2018, 11, 29, 18)))).toBe(43463.75);
    expect(toSerial(asInstant(Date.UTC(2019, 0, 1)))).toBe(43466);
  });

  it("fromSerial inverts toSerial to the millisecond", () => {
    for (const ms of [Date.UTC(2018, 11, 29, 18, 0, 1, 1), Date.UTC(1900, 2, 1, 23, 59, 59), Date.UTC(2099, 5, 15, 7, 7, 7, 999)]) {
      expect(fromSerial(toSerial(asInstant(ms)))).toBe(ms);
    }
  });

  it("fractional error stays below a millisecond", () => {
    const serial = toSerial(asInstant(Date.UTC(2018, 11, 29, 18, 0, 1)));
    expect(Math.abs(serial - (43463.75 + 1 / 86_400))).toBeLessThan(1e-8);
  });
});

describe("civil serials", () => {
  it("encode the clock reading with no zone", () => {
    const fields = { year: 2018, month: 12, day: 29, hour: 18, minute: 0, second: 0, millisecond: 0 };
    expect(serialFromCivil(fields)).toBe(43463.75);
    expect(civilFromSerial(43463.75)).toEqual(fields);
  });
});
