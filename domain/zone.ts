/**
 * domain/zone.ts
 * Zone database lookups through the runtime's IANA data (Intl).
 *
 * - resolveZone: validate an identifier
 * - offsetAt:    resolve(zone_id, instant) -> utc offset
 * - civilAt / instantFromCivil: instant <-> wall clock in a zone
 *
 * DST gaps and folds are reported, never resolved.
 */

import { asInstant, MS_PER_DAY, type Instant, type ZoneId } from "./core.js";
import {
  civilFromUtcMs,
  civilToUtcMs,
  formatCivil,
  sameCivil,
  type CivilFields,
} from "./civil.js";
import { AmbiguousLocalTimeError, InvalidZoneError } from "./errors.js";

export const UTC = "UTC" as ZoneId;

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(zone: string): Intl.DateTimeFormat {
  const cached = formatters.get(zone);
  if (cached) return cached;
  let fmt: Intl.DateTimeFormat;
  try {
    fmt = new Intl.DateTimeFormat("en-US", {
      timeZone: zone,
      hourCycle: "h23",
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
      hour: "2-digit",
      minute: "2-digit",
      second: "2-digit",
      era: "short",
    });
  } catch (err: unknown) {
    if (err instanceof RangeError) throw new InvalidZoneError(zone);
    throw err;
  }
  formatters.set(zone, fmt);
  return fmt;
}

/** Validate a zone identifier. Throws InvalidZoneError if unknown. */
export function resolveZone(zone: string): ZoneId {
  if (zone === UTC) return UTC;
  if (zone.trim() === "") throw new InvalidZoneError(zone);
  formatterFor(zone);
  return zone as ZoneId;
}

/** Wall-clock fields of an instant in a zone. */
export function civilAt(instant: Instant, zone: ZoneId): CivilFields {
  if (zone === UTC) return civilFromUtcMs(instant);
  const parts = formatterFor(zone).formatToParts(new Date(instant));
  const get = (type: Intl.DateTimeFormatPartTypes): number => {
    const part = parts.find((p) => p.type === type);
    return part ? Number(part.value) : 0;
  };
  const era = parts.find((p) => p.type === "era")?.value;
  const year = get("year");
  return {
    year: era === "BC" ? 1 - year : year,
    month: get("month"),
    day: get("day"),
    hour: get("hour"),
    minute: get("minute"),
    second: get("second"),
    // Intl drops sub-second precision; offsets are whole seconds
    millisecond: ((instant % 1000) + 1000) % 1000,
  };
}

/** UTC offset of a zone at an instant, in milliseconds (Chicago winter: -21_600_000). */
export function offsetAt(zone: ZoneId, instant: Instant): number {
  if (zone === UTC) return 0;
  return civilToUtcMs(civilAt(instant, zone)) - instant;
}

/**
 * The single instant whose wall clock in `zone` reads `fields`.
 * Throws AmbiguousLocalTimeError for a DST gap (no instant) or fold (two instants).
 */
export function instantFromCivil(fields: CivilFields, zone: ZoneId): Instant {
  const asUtc = civilToUtcMs(fields);
  if (zone === UTC) return asInstant(asUtc);

  // Any transition near the reading shows up in the offsets a day either side.
  const offsets = new Set<number>();
  for (const probe of [asUtc - MS_PER_DAY, asUtc, asUtc + MS_PER_DAY]) {
    offsets.add(offsetAt(zone, asInstant(probe)));
  }

  const matches = new Set<number>();
  for (const offset of offsets) {
    const candidate = asInstant(asUtc - offset);
    if (sameCivil(civilAt(candidate, zone), fields)) matches.add(candidate);
  }

  if (matches.size === 1) {
    const [only] = matches;
    if (only !== undefined) return asInstant(only);
  }
  throw new AmbiguousLocalTimeError(zone, formatCivil(fields), matches.size === 0 ? "gap" : "fold");
}
