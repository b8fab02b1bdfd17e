/**
 * Domain validation — assertions and invariants.
 * Framework-independent.
 */

import { InvariantViolation } from "./errors.js";

/** Throws if condition is falsy. TypeScript narrows after a successful call. */
export function assert(condition: unknown, message: string): asserts condition {
  if (!condition) {
    throw new InvariantViolation(message);
  }
}

/** Same as assert; use for invariants that must always hold. */
export function invariant(condition: unknown, message: string): asserts condition {
  if (!condition) {
    throw new InvariantViolation(message);
  }
}

/** Call in unreachable branches (e.g. exhaustive switch). Always throws. */
export function neverReached(value: never, message = "Unreachable"): never {
  throw new InvariantViolation(`${message}: ${String(value)}`);
}
