/**
 * @file src/index.ts
 * @summary Public entry point: the learn session, its draw set, the scheduling policy,
 * settings normalisation and the in-memory category model.
 */

export type * from "./types";

export { LearnSession } from "./learn/learn-session";
export { CardInfo, createCardComparator, type CategoryGroupOrder } from "./learn/card-info";
export { shouldShowFlipped } from "./learn/flip";

export {
  EquivalenceClassSet,
  type Comparator,
  type LoopIterator,
} from "./collections/equivalence-class-set";

export {
  SCHEDULE_PRESETS,
  expirationDate,
  getPresetSchedule,
  withCustomSchedule,
  withSchedulePreset,
  type PresetName,
} from "./scheduler/scheduler";
export { normaliseLearnSettings } from "./settings/settings-normalisation";
export { DEFAULT_LEARN_SETTINGS, SCHEDULE_LEVELS } from "./core/constants";
export { log, type LogLevel } from "./core/logger";
export type { RandomSource } from "./core/utils";

export { Card, type CardInit } from "./deck/card";
export { Category, categoryCardMutator } from "./deck/category";
