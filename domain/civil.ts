/**
 * domain/civil.ts
 * Civil (wall-clock) fields and their two text forms.
 *
 * - CivilString:  "YYYY-MM-DD HH:MM:SS[.fff]"       (no zone indicator)
 * - OffsetString: "YYYY-MM-DDTHH:MM:SS[.fff]Z"      (or ±HH:MM)
 *
 * Years outside 0000-9999 use the ISO 8601 expanded form, "±YYYYYY".
 *
 * All arithmetic here is zone-free: fields are mapped to/from a UTC reading.
 * Zone attribution happens in zone.ts.
 */

import { isInstantValue, MS_PER_MINUTE, type Instant } from "./core.js";

/** Wall-clock reading of a moment. Month is 1-based. */
export interface CivilFields {
  readonly year: number;
  readonly month: number;
  readonly day: number;
  readonly hour: number;
  readonly minute: number;
  readonly second: number;
  readonly millisecond: number;
}

/* -------------------------
 * Field <-> UTC milliseconds
 * ------------------------- */

/** Milliseconds of the fields read as UTC. Years 0–99 are taken literally. */
export function civilToUtcMs(f: CivilFields): number {
  const dt = new Date(0);
  dt.setUTCFullYear(f.year, f.month - 1, f.day);
  dt.setUTCHours(f.hour, f.minute, f.second, f.millisecond);
  return dt.getTime();
}

export function civilFromUtcMs(ms: number): CivilFields {
  const dt = new Date(ms);
  return {
    year: dt.getUTCFullYear(),
    month: dt.getUTCMonth() + 1,
    day: dt.getUTCDate(),
    hour: dt.getUTCHours(),
    minute: dt.getUTCMinutes(),
    second: dt.getUTCSeconds(),
    millisecond: dt.getUTCMilliseconds(),
  };
}

export function sameCivil(a: CivilFields, b: CivilFields): boolean {
  return (
    a.year === b.year &&
    a.month === b.month &&
    a.day === b.day &&
    a.hour === b.hour &&
    a.minute === b.minute &&
    a.second === b.second &&
    a.millisecond === b.millisecond
  );
}

/** False for out-of-range fields such as Feb 30 or 24:00. */
export function isValidCivil(f: CivilFields): boolean {
  if (f.hour > 23 || f.minute > 59 || f.second > 59 || f.millisecond > 999) return false;
  return sameCivil(f, civilFromUtcMs(civilToUtcMs(f)));
}

/* -------------------------
 * Formatting
 * ------------------------- */

function pad(n: number, width = 2): string {
  return String(n).padStart(width, "0");
}

function formatYear(year: number): string {
  if (year >= 0 && year <= 9999) return pad(year, 4);
  return `${year < 0 ? "-" : "+"}${pad(Math.abs(year), 6)}`;
}

function formatDate(f: CivilFields): string {
  return `${formatYear(f.year)}-${pad(f.month)}-${pad(f.day)}`;
}

function formatTime(f: CivilFields): string {
  const base = `${pad(f.hour)}:${pad(f.minute)}:${pad(f.second)}`;
  return f.millisecond !== 0 ? `${base}.${pad(f.millisecond, 3)}` : base;
}

/** "2018-12-29 18:00:00" — the `%F %T` rendering. */
export function formatCivil(f: CivilFields): string {
  return `${formatDate(f)} ${formatTime(f)}`;
}

/** "2018-12-30T00:00:00Z" — always anchored to UTC. */
export function formatOffsetUtc(instant: Instant): string {
  const f = civilFromUtcMs(instant);
  return `${formatDate(f)}T${formatTime(f)}Z`;
}

/* -------------------------
 * Parsing
 * ------------------------- */

const CIVIL_RE = /^([+-]\d{6}|\d{4})-(\d{2})-(\d{2})[ T](\d{2}):(\d{2}):(\d{2})(?:\.(\d{1,9}))?$/;
const OFFSET_RE =
  /^([+-]\d{6}|\d{4})-(\d{2})-(\d{2})[ T](\d{2}):(\d{2}):(\d{2})(?:\.(\d{1,9}))?(Z|[+-]\d{2}:\d{2})$/;

function fieldsFromMatch(m: RegExpExecArray): CivilFields | null {
  const [, y, mo, d, h, mi, s, frac] = m;
  // ISO 8601 has no negative zero year
  if (y === "-000000") return null;
  const fields: CivilFields = {
    year: Number(y),
    month: Number(mo),
    day: Number(d),
    hour: Number(h),
    minute: Number(mi),
    second: Number(s),
    // sub-millisecond digits are truncated
    millisecond: frac !== undefined ? Number(frac.padEnd(3, "0").slice(0, 3)) : 0,
  };
  return isValidCivil(fields) ? fields : null;
}

/** Parse a CivilString. Returns null if the text is not one (incl. OffsetStrings). */
export function parseCivil(text: string): CivilFields | null {
  const m = CIVIL_RE.exec(text.trim());
  return m ? fieldsFromMatch(m) : null;
}

/** Offset designator in minutes east of UTC, or null if malformed. */
function offsetMinutes(designator: string): number | null {
  if (designator === "Z") return 0;
  const sign = designator.startsWith("-") ? -1 : 1;
  const [hh, mm] = designator.slice(1).split(":").map(Number);
  if (hh === undefined || mm === undefined || hh > 23 || mm > 59) return null;
  return sign * (hh * 60 + mm);
}

/** Parse an OffsetString to its exact instant. Returns null if the text is not one. */
export function parseOffset(text: string): Instant | null {
  const m = OFFSET_RE.exec(text.trim());
  if (!m) return null;
  const fields = fieldsFromMatch(m);
  const offset = offsetMinutes(m[8] ?? "");
  if (fields === null || offset === null) return null;
  const ms = civilToUtcMs(fields) - offset * MS_PER_MINUTE;
  return isInstantValue(ms) ? ms : null;
}

/** True if the text carries a zone indicator (trailing Z or ±HH:MM). */
export function hasZoneIndicator(text: string): boolean {
  return OFFSET_RE.test(text.trim());
}
