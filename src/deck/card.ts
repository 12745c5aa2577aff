// src/deck/card.ts
import type { CardSide, LearnCard } from "../types/card";
import type { Category } from "./category";

let nextCardSeq = 1;

/** Optional starting state, e.g. when loading cards a host has persisted. */
export type CardInit = {
  id?: string;
  level?: number;
  expiresAt?: Date | null;
  learned?: Partial<Record<CardSide, number>>;
};

/**
 * In-memory flashcard. Level and learned amounts change only through
 * `categoryCardMutator` (src/deck/category.ts), which also emits the matching
 * change event.
 */
export class Card implements LearnCard {
  readonly id: string;
  front: string;
  back: string;

  level = 0;
  category: Category | null = null;
  lastTestedAt: Date | null = null;
  expiresAt: Date | null = null;

  private learned: Record<CardSide, number> = { front: 0, back: 0 };

  constructor(front: string, back: string, init: CardInit = {}) {
    this.id = init.id ?? `card-${nextCardSeq++}`;
    this.front = front;
    this.back = back;
    this.level = Math.max(0, Math.floor(init.level ?? 0));
    this.expiresAt = init.expiresAt ?? null;
    this.learned = { front: init.learned?.front ?? 0, back: init.learned?.back ?? 0 };
  }

  getLearnedAmount(side: CardSide): number {
    return this.learned[side];
  }

  /** Level 0 cards are unlearned; higher levels expire once `expiresAt` has passed. */
  isExpired(now: Date): boolean {
    return this.level > 0 && this.expiresAt !== null && this.expiresAt.getTime() <= now.getTime();
  }

  /** @internal */
  applyRaise(at: Date, expiresAt: Date): void {
    this.level += 1;
    this.lastTestedAt = at;
    this.expiresAt = expiresAt;
    this.learned = { front: 0, back: 0 };
  }

  /** @internal */
  applyReset(at: Date): void {
    this.level = 0;
    this.lastTestedAt = at;
    this.expiresAt = null;
    this.learned = { front: 0, back: 0 };
  }

  /** @internal */
  applyLearnedIncrement(side: CardSide): void {
    this.learned[side] += 1;
  }

  toString(): string {
    return `Card(${this.id}: ${this.front})`;
  }
}
