/**
 * Legacy spreadsheet serial dates.
 *
 * serial = days since 1899-12-30 + fraction of a 24h day. Day 0 sits two days
 * before 1900-01-01: one day because counting starts at 1, one for the
 * fictitious 1900-02-29. Serials from 61 on (1900-03-01) match the spreadsheet
 * display; 1..59 read one day early, 60 has no real date.
 */

import { asInstant, MS_PER_DAY, type Instant } from "./core.js";
import { civilFromUtcMs, civilToUtcMs, type CivilFields } from "./civil.js";

export type SerialDate = number;

/** 1899-12-30T00:00:00Z in epoch milliseconds. */
export const SERIAL_EPOCH_MS = Date.UTC(1899, 11, 30);

/** Serial of 1970-01-01 (the Unix epoch). */
export const UNIX_EPOCH_SERIAL = -SERIAL_EPOCH_MS / MS_PER_DAY; // 25569

export function toSerial(instant: Instant): SerialDate {
  return (instant - SERIAL_EPOCH_MS) / MS_PER_DAY;
}

/** Inverse of toSerial, rounded to the millisecond. */
export function fromSerial(serial: SerialDate): Instant {
  return asInstant(SERIAL_EPOCH_MS + Math.round(serial * MS_PER_DAY));
}

/** Serial of a wall-clock reading; no zone is involved or recorded. */
export function serialFromCivil(fields: CivilFields): SerialDate {
  return toSerial(asInstant(civilToUtcMs(fields)));
}

export function civilFromSerial(serial: SerialDate): CivilFields {
  return civilFromUtcMs(fromSerial(serial));
}
