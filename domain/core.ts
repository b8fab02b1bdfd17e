/**
 * Domain core — structural primitives only.
 * Framework-independent. No I/O.
 */

// --- Branded scalars (safer than plain numbers/strings) ---

export type Brand<T, B extends string> = T & { readonly __brand: B };

/** Absolute point in time (UTC epoch milliseconds, integer). */
export type Instant = Brand<number, "InstantMs">;

/** Span of time (milliseconds). */
export type Duration = Brand<number, "DurationMs">;

/** IANA zone identifier that has been resolved against the zone database. */
export type ZoneId = Brand<string, "ZoneId">;

// --- Constructors (no validation; see zone.ts for resolveZone) ---

export const asInstant = (ms: number) => ms as Instant;
export const asDuration = (ms: number) => ms as Duration;

export const MS_PER_SECOND = 1_000;
export const MS_PER_MINUTE = 60 * MS_PER_SECOND;
export const MS_PER_HOUR = 60 * MS_PER_MINUTE;
export const MS_PER_DAY = 24 * MS_PER_HOUR;

export const hours = (n: number): Duration => asDuration(n * MS_PER_HOUR);

/** Largest distance from the epoch a Date can hold (±100,000,000 days). */
export const MAX_INSTANT_MS = 8.64e15;

/** True for values usable as an Instant: integer milliseconds within the Date range. */
export function isInstantValue(value: unknown): value is Instant {
  return typeof value === "number" && Number.isSafeInteger(value) && Math.abs(value) <= MAX_INSTANT_MS;
}

/** Add a duration to an instant. */
export function addDuration(i: Instant, d: Duration): Instant {
  return asInstant(i + d);
}
