// src/learn/card-info.ts
// ---------------------------------------------------------------------------
// Per-session wrapper around a card, and the comparator that sorts wrappers
// into equivalence classes for drawing.
//
// Draw order by settings:
//   shuffleRatio 0, no grouping   -> level
//   shuffleRatio 0, grouping      -> level, category position
//   shuffleRatio > 0              -> same keys, but some cards carry a
//                                    shuffled ("shadow") level
// ---------------------------------------------------------------------------

import type { Comparator } from "../collections/equivalence-class-set";
import type { LearnCard } from "../types/card";

export class CardInfo<C extends LearnCard> {
  readonly card: C;

  /** Shadow level: the draw-order key. Equals `card.level` unless shuffled. */
  level: number;
  /** True while `level` was deliberately set away from the card's real level. */
  shuffled = false;

  constructor(card: C) {
    this.card = card;
    this.level = card.level;
  }

  get category(): object | null {
    return this.card.category;
  }

  /** Whether the shadow level no longer tracks a changed real level. */
  isStale(): boolean {
    return !this.shuffled && this.level !== this.card.level;
  }

  /** Drop any shuffled level and follow the card's real level again. */
  syncLevel(): void {
    this.level = this.card.level;
    this.shuffled = false;
  }
}

/** Category -> position; `null` (no category) holds the last position. */
export type CategoryGroupOrder = ReadonlyMap<object | null, number>;

export function createCardComparator<C extends LearnCard>(
  categoryOrder: CategoryGroupOrder | null,
): Comparator<CardInfo<C>> {
  const last = categoryOrder ? categoryOrder.size : 0;
  const position = (category: object | null) => categoryOrder?.get(category) ?? last;

  return (a, b) => {
    if (a.level !== b.level) return a.level < b.level ? -1 : 1;
    if (!categoryOrder) return 0;
    // Categories outside the learned subtree sort after the uncategorised cards.
    return position(a.category) - position(b.category);
  };
}
