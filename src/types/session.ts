// src/types/session.ts
// ---------------------------------------------------------------------------
// Host-facing session contracts: lifecycle state, the end-of-session sink,
// per-card presentation observers and construction options.
// ---------------------------------------------------------------------------

import type { RandomSource } from "../core/utils";
import type { CardMutator, LearnCard, LearnCategory } from "./card";
import type { LearnSettings } from "./settings";

export type SessionState = "unstarted" | "running" | "ended";

/** Receives the session exactly once, when it ends. */
export interface LearnSessionProvider<S> {
  sessionEnded(session: S): void;
}

export interface LearnCardObserver<C extends LearnCard = LearnCard> {
  nextCardFetched(card: C, flipped: boolean): void;
}

export type LearnSessionOptions<C extends LearnCard, S> = {
  /** Category whose subtree is learned. Events are taken from its root. */
  category: LearnCategory<C>;
  settings: LearnSettings;
  mutator: CardMutator<C>;
  provider: LearnSessionProvider<S>;

  /** Used only when both `learnUnlearned` and `learnExpired` are false. */
  selectedCards?: readonly C[];
  learnUnlearned?: boolean;
  learnExpired?: boolean;

  /** Defaults to Math.random. */
  random?: RandomSource;
  /** Defaults to the wall clock. */
  now?: () => Date;
};
