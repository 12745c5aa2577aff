/**
 * @file src/deck/category.ts
 * @summary In-memory category tree that owns cards and implements the contracts a learn
 * session consumes. Card additions, removals and level changes are announced as
 * CardEvent messages that bubble from the card's category up to the root, so a listener
 * on the root sees every change in the tree.
 *
 * @exports
 *   - Category — tree node holding cards and child categories
 *   - categoryCardMutator — CardMutator that changes a Card and emits the matching event
 */

import type { CardEvent, CardEventListener, CardMutator, CardSide, LearnCategory } from "../types/card";
import type { Card } from "./card";

export class Category implements LearnCategory<Card> {
  readonly name: string;
  private _parent: Category | null = null;
  private readonly _children: Category[] = [];
  // Presentation order; reappend moves a card to the end.
  private readonly _cards: Card[] = [];
  private readonly listeners = new Set<CardEventListener<Card>>();

  constructor(name: string) {
    this.name = name;
  }

  get parent(): Category | null {
    return this._parent;
  }

  get children(): readonly Category[] {
    return this._children;
  }

  getRoot(): Category {
    let cur: Category = this;
    while (cur._parent) cur = cur._parent;
    return cur;
  }

  /** Creates (or attaches) a child category. */
  addCategoryChild(child: Category | string): Category {
    const node = typeof child === "string" ? new Category(child) : child;
    if (node._parent) throw new Error(`Category "${node.name}" already has a parent.`);
    if (node === this || node.getSubtreeList().includes(this)) {
      throw new Error(`Category "${node.name}" cannot be attached below itself.`);
    }
    node._parent = this;
    this._children.push(node);
    return node;
  }

  /** This category followed by its descendants, depth first, parents before children. */
  getSubtreeList(): Category[] {
    const out: Category[] = [this];
    for (const child of this._children) out.push(...child.getSubtreeList());
    return out;
  }

  /** Cards directly in this category. */
  getCards(): Card[] {
    return [...this._cards];
  }

  /** Cards in this category and all descendants. */
  getSubtreeCards(): Card[] {
    return this.getSubtreeList().flatMap((c) => c._cards);
  }

  getUnlearnedCards(): Card[] {
    return this.getSubtreeCards().filter((c) => c.level === 0);
  }

  getExpiredCards(now: Date): Card[] {
    return this.getSubtreeCards().filter((c) => c.isExpired(now));
  }

  addCard(card: Card): void {
    if (card.category) throw new Error(`${card.toString()} already belongs to "${card.category.name}".`);
    card.category = this;
    this._cards.push(card);
    this.emit({ type: "added", card });
  }

  removeCard(card: Card): void {
    const idx = this._cards.indexOf(card);
    if (idx < 0) throw new Error(`${card.toString()} is not in category "${this.name}".`);
    this._cards.splice(idx, 1);
    card.category = null;
    this.emit({ type: "removed", card });
  }

  /** Removal from the old category followed by addition to `target`; emits both events. */
  moveCard(card: Card, target: Category): void {
    this.removeCard(card);
    target.addCard(card);
  }

  subscribe(listener: CardEventListener<Card>): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** @internal */
  reappendCard(card: Card): void {
    const idx = this._cards.indexOf(card);
    if (idx < 0) throw new Error(`${card.toString()} is not in category "${this.name}".`);
    this._cards.splice(idx, 1);
    this._cards.push(card);
  }

  /** Delivers `event` to listeners of this category and of every ancestor. */
  emit(event: CardEvent<Card>): void {
    for (let cur: Category | null = this; cur; cur = cur._parent) {
      // Copy: a listener may unsubscribe while being notified.
      for (const listener of [...cur.listeners]) listener(event);
    }
  }
}

function owningCategory(card: Card): Category {
  if (!card.category) throw new Error(`${card.toString()} does not belong to a category.`);
  return card.category;
}

export const categoryCardMutator: CardMutator<Card> = {
  raiseLevel(card: Card, at: Date, expiresAt: Date) {
    const category = owningCategory(card);
    card.applyRaise(at, expiresAt);
    category.emit({ type: "deckChanged", card });
  },

  resetLevel(card: Card, at: Date) {
    const category = owningCategory(card);
    card.applyReset(at);
    category.emit({ type: "deckChanged", card });
  },

  reappend(card: Card) {
    const category = owningCategory(card);
    category.reappendCard(card);
    category.emit({ type: "deckChanged", card });
  },

  incrementLearnedAmount(card: Card, side: CardSide) {
    const category = owningCategory(card);
    card.applyLearnedIncrement(side);
    category.emit({ type: "deckChanged", card });
  },
};
