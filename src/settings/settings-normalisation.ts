/**
 * @file src/settings/settings-normalisation.ts
 * @summary Turns an untrusted settings object (parsed JSON, a host's saved preferences,
 * a partial override) into a complete, frozen LearnSettings. Missing keys take their
 * defaults, numbers are clamped to their valid ranges and unknown enum strings fall back
 * to the default value.
 *
 * @exports
 *   - normaliseLearnSettings — fill defaults and clamp values, returning frozen LearnSettings
 */

import { DEFAULT_LEARN_SETTINGS, SCHEDULE_LEVELS } from "../core/constants";
import { log } from "../core/logger";
import { clamp, cleanMinuteArray, isPlainObject } from "../core/utils";
import { getPresetSchedule, SCHEDULE_PRESETS, type PresetName } from "../scheduler/scheduler";
import type { CategoryOrder, LearnSettings, SchedulePreset, SidesMode } from "../types/settings";

const SIDES_MODES: readonly SidesMode[] = ["normal", "flipped", "random", "both"];
const CATEGORY_ORDERS: readonly CategoryOrder[] = ["fixed", "random"];

function pickEnum<T extends string>(raw: unknown, allowed: readonly T[], fallback: T): T {
  const key = typeof raw === "string" ? raw.trim().toLowerCase() : "";
  const hit = allowed.find((v) => v === key);
  return hit ?? fallback;
}

function toBool(raw: unknown, fallback: boolean): boolean {
  return typeof raw === "boolean" ? raw : fallback;
}

function toInt(raw: unknown, fallback: number, lo: number, hi: number): number {
  const n = Number(raw ?? fallback);
  if (!Number.isFinite(n)) return fallback;
  return clamp(Math.round(n), lo, hi);
}

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const v = raw[key];
  return isPlainObject(v) ? v : {};
}

function isPresetName(v: SchedulePreset): v is PresetName {
  return v !== "custom";
}

/**
 * Normalise `raw` into LearnSettings. Non-object input yields the defaults.
 *
 * A "custom" preset keeps the supplied schedule when it has SCHEDULE_LEVELS
 * finite entries; otherwise the default schedule is used and a warning logged.
 * Named presets always regenerate their schedule, ignoring any `schedule` key.
 */
export function normaliseLearnSettings(raw: unknown): LearnSettings {
  const s = isPlainObject(raw) ? raw : {};
  const d = DEFAULT_LEARN_SETTINGS;

  const amount = section(s, "amountToTest");
  const fixed = section(s, "fixedExpirationTime");
  const cardLimit = section(s, "cardLimit");
  const timeLimit = section(s, "timeLimit");

  const preset = pickEnum<SchedulePreset>(
    s.schedulePreset,
    [...SCHEDULE_PRESETS, "custom"],
    d.schedulePreset,
  );

  let schedule: number[];
  if (isPresetName(preset)) {
    schedule = getPresetSchedule(preset);
  } else {
    const rawSchedule = s.schedule;
    schedule = cleanMinuteArray(rawSchedule, SCHEDULE_LEVELS, d.schedule);
    const exact =
      Array.isArray(rawSchedule) &&
      rawSchedule.length === SCHEDULE_LEVELS &&
      rawSchedule.every((m) => Number.isInteger(m) && m >= 0);
    if (!exact) log.warn("Custom schedule was invalid or had to be rounded; check the stored settings.");
  }

  const shuffleRatio = Number(s.shuffleRatio ?? d.shuffleRatio);

  return Object.freeze({
    amountToTest: Object.freeze({
      front: toInt(amount.front, d.amountToTest.front, 1, 1000),
      back: toInt(amount.back, d.amountToTest.back, 1, 1000),
    }),
    schedulePreset: preset,
    schedule: Object.freeze(schedule),
    fixedExpirationTime: Object.freeze({
      enabled: toBool(fixed.enabled, d.fixedExpirationTime.enabled),
      hour: toInt(fixed.hour, d.fixedExpirationTime.hour, 0, 23),
      minute: toInt(fixed.minute, d.fixedExpirationTime.minute, 0, 59),
    }),
    cardLimit: Object.freeze({
      enabled: toBool(cardLimit.enabled, d.cardLimit.enabled),
      value: toInt(cardLimit.value, d.cardLimit.value, 0, Number.MAX_SAFE_INTEGER),
    }),
    timeLimit: Object.freeze({
      enabled: toBool(timeLimit.enabled, d.timeLimit.enabled),
      minutes: toInt(timeLimit.minutes, d.timeLimit.minutes, 0, Number.MAX_SAFE_INTEGER),
    }),
    retestFailedCards: toBool(s.retestFailedCards, d.retestFailedCards),
    sidesMode: pickEnum(s.sidesMode, SIDES_MODES, d.sidesMode),
    groupByCategory: toBool(s.groupByCategory, d.groupByCategory),
    categoryOrder: pickEnum(s.categoryOrder, CATEGORY_ORDERS, d.categoryOrder),
    shuffleRatio: Number.isFinite(shuffleRatio) ? clamp(shuffleRatio, 0, 1) : d.shuffleRatio,
  });
}
