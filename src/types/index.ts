// src/types/index.ts
// ---------------------------------------------------------------------------
// Barrel re-export — import any shared type from "types" or "types/index".
// Organised by domain: card → settings → session.
// ---------------------------------------------------------------------------

export type {
  CardSide,
  LearnCard,
  CardEvent,
  CardEventListener,
  LearnCategory,
  CardMutator,
} from "./card";
export type { SchedulePreset, SidesMode, CategoryOrder, LearnSettings } from "./settings";
export type {
  SessionState,
  LearnSessionProvider,
  LearnCardObserver,
  LearnSessionOptions,
} from "./session";
