/**
 * @file src/core/utils.ts
 * @summary Generic utility functions shared across the scheduler. Provides numeric
 * clamping, non-negative-integer-array sanitisation, plain-object type guard, random
 * helpers over an injectable random source, and the `invariant` assertion used for
 * internal consistency checks.
 *
 * @exports
 *   - RandomSource       — function returning a float in [0, 1)
 *   - clamp              — clamp a number between lo and hi
 *   - cleanMinuteArray   — sanitise an unknown value into a fixed-length minute array
 *   - isPlainObject      — type guard for Record<string, unknown>
 *   - randomInt          — uniform integer in [0, bound)
 *   - shuffleInPlace     — Fisher-Yates shuffle
 *   - invariant          — throw when an internal assumption does not hold
 */

/** A source of uniformly distributed floats in [0, 1), e.g. `Math.random`. */
export type RandomSource = () => number;

/** Clamp `n` between `lo` and `hi` (inclusive). */
export function clamp(n: number, lo: number, hi: number): number {
  return Math.max(lo, Math.min(hi, n));
}

/**
 * Coerce an unknown value into an array of exactly `length` non-negative integers.
 * Returns a copy of `fallback` if the input is not an array of that length or
 * any entry is not a finite number.
 */
export function cleanMinuteArray(v: unknown, length: number, fallback: readonly number[]): number[] {
  if (!Array.isArray(v) || v.length !== length) return [...fallback];
  const out = v.map((x) => Number(x));
  if (out.some((n) => !Number.isFinite(n))) return [...fallback];
  return out.map((n) => Math.max(0, Math.round(n)));
}

/** Type guard: returns true if `v` is a non-null, non-array object. */
export function isPlainObject(v: unknown): v is Record<string, unknown> {
  return !!v && typeof v === "object" && !Array.isArray(v);
}

/** Uniform integer in `[0, bound)`. */
export function randomInt(random: RandomSource, bound: number): number {
  return Math.min(bound - 1, Math.floor(random() * bound));
}

/** Fisher-Yates shuffle. Mutates and returns `arr`. */
export function shuffleInPlace<T>(arr: T[], random: RandomSource): T[] {
  for (let i = arr.length - 1; i > 0; i--) {
    const j = randomInt(random, i + 1);
    [arr[i], arr[j]] = [arr[j], arr[i]];
  }
  return arr;
}

/**
 * Internal consistency check. A failure means the scheduler's own bookkeeping is
 * corrupt, not that a caller passed bad input.
 */
export function invariant(condition: unknown, message: string): asserts condition {
  if (!condition) throw new Error(`Invariant violated: ${message}`);
}
