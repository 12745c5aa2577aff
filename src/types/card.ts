/**
 * @file src/types/card.ts
 * @summary Contracts between the learn session and the card/category model it drives.
 * The session never creates or deletes cards: it reads levels, categories and learned
 * amounts, and asks a CardMutator to change them. Mutations are announced back through
 * CardEvent messages delivered to every subscriber of the category tree's root.
 *
 * @exports
 *   - CardSide — "front" | "back"
 *   - LearnCard — what the session reads from a card
 *   - CardEvent — change notification emitted by the category tree
 *   - CardEventListener — subscriber callback for CardEvent
 *   - LearnCategory — what the session reads from a category
 *   - CardMutator — the mutation API the session calls into
 */

export type CardSide = "front" | "back";

export interface LearnCard {
  /** Deck level; 0 is the newest deck. */
  readonly level: number;
  /** Owning category, compared by identity. `null` for uncategorised cards. */
  readonly category: object | null;
  /** Correct answers recorded for one side since the card last changed level. */
  getLearnedAmount(side: CardSide): number;
}

export type CardEvent<C extends LearnCard = LearnCard> =
  | { type: "added"; card: C }
  | { type: "removed"; card: C }
  | { type: "deckChanged"; card: C };

export type CardEventListener<C extends LearnCard = LearnCard> = (event: CardEvent<C>) => void;

export interface LearnCategory<C extends LearnCard = LearnCard> {
  readonly parent: LearnCategory<C> | null;

  /** This category and all of its descendants, parents before children. */
  getSubtreeList(): LearnCategory<C>[];
  /** Level-0 cards of the subtree. */
  getUnlearnedCards(): C[];
  /** Cards of the subtree whose due date is at or before `now`. */
  getExpiredCards(now: Date): C[];

  /** Receive events for this category and everything below it. Returns an unsubscribe. */
  subscribe(listener: CardEventListener<C>): () => void;
}

/**
 * Every method must synchronously emit exactly one CardEvent for the card, before
 * returning, to all subscribers of the card's category tree.
 */
export interface CardMutator<C extends LearnCard = LearnCard> {
  raiseLevel(card: C, at: Date, expiresAt: Date): void;
  resetLevel(card: C, at: Date): void;
  /** Move the card to the end of its deck's presentation order. */
  reappend(card: C): void;
  incrementLearnedAmount(card: C, side: CardSide): void;
}
