// src/scheduler/scheduler.ts
// ---------------------------------------------------------------------------
// Leitner scheduling policy — preset expiration schedules and the due-date
// computation used when a card is raised to the next deck.
//
// Settings are read-only: the schedule setters return new settings objects.
// ---------------------------------------------------------------------------

import { date_scheduler } from "ts-fsrs";
import { MINUTES_DAY, SCHEDULE_LEVELS } from "../core/constants";
import { log } from "../core/logger";
import type { LearnSettings, SchedulePreset } from "../types/settings";

export type PresetName = Exclude<SchedulePreset, "custom">;

export const SCHEDULE_PRESETS: readonly PresetName[] = [
  "constant",
  "linear",
  "quadratic",
  "exponential",
  "cram",
];

function buildSchedule(minutesForLevel: (level: number) => number): number[] {
  return Array.from({ length: SCHEDULE_LEVELS }, (_, i) => minutesForLevel(i));
}

/** Minutes-per-level schedule of a named preset. Unknown names fall back to linear. */
export function getPresetSchedule(preset: PresetName): number[] {
  switch (preset) {
    case "constant":
      return buildSchedule(() => MINUTES_DAY);
    case "linear":
      return buildSchedule((i) => (i + 1) * MINUTES_DAY);
    case "quadratic":
      return buildSchedule((i) => (i + 1) ** 2 * MINUTES_DAY);
    case "exponential":
      return buildSchedule((i) => 2 ** i * MINUTES_DAY);
    case "cram":
      return buildSchedule((i) => (i + 1) * 5);
    default: {
      // Only reachable if string drift gets past the type system (e.g. stored settings).
      log.warn("Unknown schedule preset, using linear:", preset);
      return buildSchedule((i) => (i + 1) * MINUTES_DAY);
    }
  }
}

export function withSchedulePreset(settings: LearnSettings, preset: PresetName): LearnSettings {
  return Object.freeze({
    ...settings,
    schedulePreset: preset,
    schedule: Object.freeze(getPresetSchedule(preset)),
  });
}

export function withCustomSchedule(settings: LearnSettings, schedule: readonly number[]): LearnSettings {
  if (schedule.length !== SCHEDULE_LEVELS) {
    throw new Error(`A schedule needs exactly ${SCHEDULE_LEVELS} entries, got ${schedule.length}.`);
  }
  if (schedule.some((m) => !Number.isFinite(m) || m < 0)) {
    throw new Error("Schedule entries must be non-negative minute counts.");
  }
  return Object.freeze({
    ...settings,
    schedulePreset: "custom",
    schedule: Object.freeze([...schedule]),
  });
}

/**
 * When a card learned at `learnedAt` is due again.
 *
 * `level` is the card's deck level *before* it is raised; levels past the end of
 * the schedule use the last entry. With a fixed expiration time the result is
 * moved to the next occurrence of that local time of day: if the computed time
 * of day is already at or past it, that is the following calendar day.
 */
export function expirationDate(settings: LearnSettings, learnedAt: Date, level: number): Date {
  const index = Math.min(Math.max(0, level), SCHEDULE_LEVELS - 1);
  const due = date_scheduler(learnedAt, settings.schedule[index]);

  const fixed = settings.fixedExpirationTime;
  if (!fixed.enabled) return due;

  const hour = due.getHours();
  const minute = due.getMinutes();
  if (hour > fixed.hour || (hour === fixed.hour && minute >= fixed.minute)) {
    due.setDate(due.getDate() + 1);
  }
  due.setHours(fixed.hour, fixed.minute, 0, 0);
  return due;
}
