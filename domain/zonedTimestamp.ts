/**
 * Instant + display zone.
 * The zone only changes how an instant is rendered; equality is on instants.
 */

import { addDuration, asInstant, type Duration, type Instant, type ZoneId } from "./core.js";
import { formatCivil, parseCivil, type CivilFields } from "./civil.js";
import { civilAt, instantFromCivil, resolveZone, UTC } from "./zone.js";
import { ParseError } from "./errors.js";
import { assert } from "./validation.js";

export interface ZonedTimestamp {
  readonly instant: Instant;
  readonly zone: ZoneId;
}

/** Tag an instant with a display zone (validated). */
export function zoned(instant: Instant, zone: string = UTC): ZonedTimestamp {
  return { instant, zone: resolveZone(zone) };
}

export function nowInZone(zone: string): ZonedTimestamp {
  return zoned(asInstant(Date.now()), zone);
}

export function toInstant(zt: ZonedTimestamp): Instant {
  return zt.instant;
}

/** Civil fields as the clock reads in the timestamp's zone. */
export function civilOf(zt: ZonedTimestamp): CivilFields {
  return civilAt(zt.instant, zt.zone);
}

/** CivilString in the timestamp's zone, e.g. "2018-12-29 18:00:00". */
export function render(zt: ZonedTimestamp): string {
  return formatCivil(civilOf(zt));
}

/** Same instant, displayed in another zone (`with_tz`). */
export function withZone(zt: ZonedTimestamp, zone: string): ZonedTimestamp {
  return zoned(zt.instant, zone);
}

/**
 * Same clock reading, attributed to another zone (`force_tz`).
 * Produces a different instant whenever the two zones' offsets differ.
 */
export function forceZone(zt: ZonedTimestamp, zone: string): ZonedTimestamp {
  const target = resolveZone(zone);
  return { instant: instantFromCivil(civilOf(zt), target), zone: target };
}

export function instantsEqual(a: ZonedTimestamp, b: ZonedTimestamp): boolean {
  return a.instant === b.instant;
}

/**
 * Parse a CivilString as occurring in `zone`. Equivalent to
 * forceZone(<fields read as UTC>, zone).
 */
export function parseCivilIn(text: string, zone: string = UTC): ZonedTimestamp {
  const fields = parseCivil(text);
  if (fields === null) throw new ParseError(`Not a civil timestamp: ${JSON.stringify(text)}`, text);
  const target = resolveZone(zone);
  return { instant: instantFromCivil(fields, target), zone: target };
}

/** Instants from `from` to `to` inclusive, every `step` (`seq(from, to, by = ...)`). */
export function instantSequence(from: Instant, to: Instant, step: Duration): Instant[] {
  assert(step > 0, "step must be > 0");
  const out: Instant[] = [];
  for (let cur = from; cur <= to; cur = addDuration(cur, step)) out.push(cur);
  return out;
}
