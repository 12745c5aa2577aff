// tests/settings-normalisation.test.ts
// ---------------------------------------------------------------------------
// Tests for src/settings/settings-normalisation.ts — defaults, clamping,
// enum fallback and schedule handling for untrusted settings input.
// ---------------------------------------------------------------------------

import { describe, it, expect, vi, afterEach } from "vitest";
import { normaliseLearnSettings } from "../src/settings/settings-normalisation";
import { DEFAULT_LEARN_SETTINGS } from "../src/core/constants";
import { getPresetSchedule } from "../src/scheduler/scheduler";
import { log } from "../src/core/logger";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("normaliseLearnSettings", () => {
  it("returns the defaults for non-object input", () => {
    expect(normaliseLearnSettings(undefined)).toEqual(DEFAULT_LEARN_SETTINGS);
    expect(normaliseLearnSettings("nope")).toEqual(DEFAULT_LEARN_SETTINGS);
    expect(normaliseLearnSettings([1, 2])).toEqual(DEFAULT_LEARN_SETTINGS);
  });

  it("keeps valid values", () => {
    const s = normaliseLearnSettings({
      amountToTest: { front: 2, back: 3 },
      cardLimit: { enabled: true, value: 20 },
      timeLimit: { enabled: true, minutes: 15 },
      retestFailedCards: true,
      sidesMode: "both",
      groupByCategory: true,
      categoryOrder: "random",
      shuffleRatio: 0.25,
    });

    expect(s.amountToTest).toEqual({ front: 2, back: 3 });
    expect(s.cardLimit).toEqual({ enabled: true, value: 20 });
    expect(s.timeLimit).toEqual({ enabled: true, minutes: 15 });
    expect(s.retestFailedCards).toBe(true);
    expect(s.sidesMode).toBe("both");
    expect(s.groupByCategory).toBe(true);
    expect(s.categoryOrder).toBe("random");
    expect(s.shuffleRatio).toBe(0.25);
  });

  it("clamps numeric ranges", () => {
    const s = normaliseLearnSettings({
      amountToTest: { front: 0, back: 2.6 },
      fixedExpirationTime: { enabled: true, hour: 25, minute: -4 },
      cardLimit: { enabled: true, value: -3 },
      shuffleRatio: 1.7,
    });

    expect(s.amountToTest).toEqual({ front: 1, back: 3 });
    expect(s.fixedExpirationTime).toEqual({ enabled: true, hour: 23, minute: 0 });
    expect(s.cardLimit.value).toBe(0);
    expect(s.shuffleRatio).toBe(1);
  });

  it("falls back to defaults for non-numeric numbers and non-boolean flags", () => {
    const s = normaliseLearnSettings({
      shuffleRatio: "lots",
      retestFailedCards: "yes",
      cardLimit: { enabled: 1, value: "abc" },
    });

    expect(s.shuffleRatio).toBe(0);
    expect(s.retestFailedCards).toBe(false);
    expect(s.cardLimit).toEqual({ enabled: false, value: 0 });
  });

  it("accepts enum values case-insensitively and rejects unknown ones", () => {
    expect(normaliseLearnSettings({ sidesMode: " Flipped " }).sidesMode).toBe("flipped");
    expect(normaliseLearnSettings({ sidesMode: "sideways" }).sidesMode).toBe("normal");
    expect(normaliseLearnSettings({ categoryOrder: "alphabetical" }).categoryOrder).toBe("fixed");
  });

  it("regenerates the schedule of a named preset", () => {
    const s = normaliseLearnSettings({ schedulePreset: "exponential", schedule: [1, 2, 3] });
    expect(s.schedulePreset).toBe("exponential");
    expect(s.schedule).toEqual(getPresetSchedule("exponential"));
  });

  it("keeps a valid custom schedule", () => {
    const schedule = [10, 20, 30, 40, 50, 60, 70, 80, 90, 100];
    const s = normaliseLearnSettings({ schedulePreset: "custom", schedule });
    expect(s.schedulePreset).toBe("custom");
    expect(s.schedule).toEqual(schedule);
  });

  it("replaces an invalid custom schedule with the default and warns", () => {
    const warn = vi.spyOn(log, "warn").mockImplementation(() => {});
    const s = normaliseLearnSettings({ schedulePreset: "custom", schedule: [10, 20] });

    expect(s.schedulePreset).toBe("custom");
    expect(s.schedule).toEqual(DEFAULT_LEARN_SETTINGS.schedule);
    expect(warn).toHaveBeenCalledOnce();
  });

  it("returns frozen settings", () => {
    const s = normaliseLearnSettings({});
    expect(Object.isFrozen(s)).toBe(true);
    expect(Object.isFrozen(s.amountToTest)).toBe(true);
    expect(Object.isFrozen(s.schedule)).toBe(true);
  });
});
