/**
 * @file src/types/settings.ts
 * @summary Learn-settings type definition. Describes the strategy a learn session follows:
 * per-side pass targets, the expiration schedule, limits, side presentation and ordering.
 * Only the types are defined here; DEFAULT_LEARN_SETTINGS lives in src/core/constants.ts
 * and validation in src/settings/settings-normalisation.ts.
 *
 * @exports
 *   - SchedulePreset — named schedule presets plus "custom"
 *   - SidesMode — how card sides are presented
 *   - CategoryOrder — category ordering when grouping by category
 *   - LearnSettings — complete, read-only learn strategy
 */

/** Named presets; "custom" means the schedule array was supplied by the caller. */
export type SchedulePreset = "constant" | "linear" | "quadratic" | "exponential" | "cram" | "custom";

/**
 * - normal: front first
 * - flipped: back first
 * - random: coin flip per card
 * - both: each side must reach its own pass target
 */
export type SidesMode = "normal" | "flipped" | "random" | "both";

export type CategoryOrder = "fixed" | "random";

/**
 * Learn strategy. Treated as immutable for the lifetime of a session; build new
 * objects with the helpers in src/scheduler/ and src/settings/ instead of mutating.
 */
export type LearnSettings = Readonly<{
  /** Correct answers needed per side before a card counts as learned (both-sides mode). */
  amountToTest: Readonly<{ front: number; back: number }>;

  schedulePreset: SchedulePreset;
  /**
   * Minutes until a raised card is due again, indexed by the level the card had
   * *before* it was raised. Always SCHEDULE_LEVELS entries long.
   */
  schedule: readonly number[];

  /** Snap due dates forward to a fixed local time of day. */
  fixedExpirationTime: Readonly<{ enabled: boolean; hour: number; minute: number }>;

  cardLimit: Readonly<{ enabled: boolean; value: number }>;
  timeLimit: Readonly<{ enabled: boolean; minutes: number }>;

  /** Put failed cards back into the pool instead of dropping them for the session. */
  retestFailedCards: boolean;
  sidesMode: SidesMode;

  groupByCategory: boolean;
  categoryOrder: CategoryOrder;

  /** 0 = strictly by level, 1 = every card at a random level. */
  shuffleRatio: number;
}>;
