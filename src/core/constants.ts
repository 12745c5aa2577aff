/**
 * @file src/core/constants.ts
 * @summary Central constants for the scheduler: schedule dimensions, time units and the
 * factory-default learn settings.
 *
 * @exports
 *   - SCHEDULE_LEVELS — number of entries in an expiration schedule
 *   - MS_MINUTE — milliseconds in one minute
 *   - MINUTES_DAY — minutes in one day
 *   - MAX_TIMER_DELAY_MS — longest delay a single setTimeout can hold
 *   - DEFAULT_LEARN_SETTINGS — factory-default LearnSettings (linear schedule)
 */

import type { LearnSettings } from "../types/settings";

/** Levels beyond the last index reuse the last entry. */
export const SCHEDULE_LEVELS = 10;

export const MS_MINUTE = 60 * 1000;
export const MINUTES_DAY = 24 * 60;

/** 2^31 - 1; Node fires longer timeouts after 1 ms. */
export const MAX_TIMER_DELAY_MS = 0x7fffffff;

const LINEAR_SCHEDULE = Array.from({ length: SCHEDULE_LEVELS }, (_, i) => (i + 1) * MINUTES_DAY);

export const DEFAULT_LEARN_SETTINGS: LearnSettings = Object.freeze({
  amountToTest: Object.freeze({ front: 1, back: 1 }),
  schedulePreset: "linear",
  schedule: Object.freeze(LINEAR_SCHEDULE),
  fixedExpirationTime: Object.freeze({ enabled: false, hour: 0, minute: 0 }),
  cardLimit: Object.freeze({ enabled: false, value: 0 }),
  timeLimit: Object.freeze({ enabled: false, minutes: 0 }),
  retestFailedCards: false,
  sidesMode: "normal",
  groupByCategory: false,
  categoryOrder: "fixed",
  shuffleRatio: 0,
});
