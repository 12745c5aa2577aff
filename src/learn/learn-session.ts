/**
 * @file src/learn/learn-session.ts
 * @summary The learn-session state machine. Builds the candidate pool from a category
 * subtree, draws the next card from the lowest deck level first, applies pass / fail /
 * skip outcomes through the card mutator, and ends the session on quit, exhaustion or
 * the card limit.
 *
 * Flow for one card:
 *   1. The session draws a card and notifies its LearnCardObservers.
 *   2. The host reports the answer with cardChecked() or cardSkipped().
 *   3. That call mutates the card through the CardMutator, which emits a CardEvent on
 *      the category tree. The session receives it in onCardEvent() (re-entrantly, before
 *      step 2 returns) and draws the next card or ends.
 * A card that is deleted or changed by someone else enters at step 3 directly.
 *
 * @exports
 *   - LearnSession — the session class
 */

import { EquivalenceClassSet } from "../collections/equivalence-class-set";
import { MAX_TIMER_DELAY_MS, MS_MINUTE } from "../core/constants";
import { log } from "../core/logger";
import { invariant, randomInt, shuffleInPlace, type RandomSource } from "../core/utils";
import { expirationDate } from "../scheduler/scheduler";
import type { CardEvent, CardMutator, CardSide, LearnCard, LearnCategory } from "../types/card";
import type {
  LearnCardObserver,
  LearnSessionOptions,
  LearnSessionProvider,
  SessionState,
} from "../types/session";
import type { LearnSettings } from "../types/settings";
import { CardInfo, createCardComparator, type CategoryGroupOrder } from "./card-info";
import { shouldShowFlipped } from "./flip";

export class LearnSession<C extends LearnCard = LearnCard> {
  readonly settings: LearnSettings;
  /** The category whose subtree is being learned. */
  readonly category: LearnCategory<C>;

  private readonly root: LearnCategory<C>;
  private readonly mutator: CardMutator<C>;
  private readonly provider: LearnSessionProvider<LearnSession<C>>;
  private readonly random: RandomSource;
  private readonly now: () => Date;

  private _state: SessionState = "unstarted";
  private quitRequested = false;
  private current: CardInfo<C> | null = null;
  private _startedAt: Date | null = null;
  private _endedAt: Date | null = null;

  // Exclusive pools. Cards move reserve <-> active and active -> learned,
  // never out of learned.
  private active: EquivalenceClassSet<CardInfo<C>>;
  private reserve: EquivalenceClassSet<CardInfo<C>>;
  private readonly learned = new Set<C>();

  // Markers. Passed = learned - everFailed, Relearned = learned & everFailed,
  // Failed = everFailed - learned. Learned & skipped is always empty.
  private readonly everFailed = new Set<C>();
  private readonly skipped = new Set<C>();
  // Only active cards; partially learned cards parked in reserve are not tracked.
  private readonly partiallyLearned = new Set<C>();

  // Every card shown so far, in last-seen order.
  private readonly checked: C[] = [];
  private readonly infos = new Map<C, CardInfo<C>>();

  private readonly observers: LearnCardObserver<C>[] = [];
  private unsubscribe: (() => void) | null = null;
  private timer: ReturnType<typeof setTimeout> | null = null;

  constructor(options: LearnSessionOptions<C, LearnSession<C>>) {
    this.category = options.category;
    this.settings = options.settings;
    this.mutator = options.mutator;
    this.provider = options.provider;
    this.random = options.random ?? Math.random;
    this.now = options.now ?? (() => new Date());

    let root = options.category;
    while (root.parent) root = root.parent;
    this.root = root;

    const order = this.settings.groupByCategory ? this.createCategoryGroupOrder() : null;
    const infos = this.fetchCards(
      options.selectedCards ?? [],
      options.learnUnlearned ?? false,
      options.learnExpired ?? false,
    );

    this.active = new EquivalenceClassSet(createCardComparator<C>(order), this.random);
    this.active.addAll(infos);
    this.reserve = new EquivalenceClassSet(this.active.comparator, this.random);

    // Cards removed or moved before start() must already be tracked.
    this.unsubscribe = this.root.subscribe((event) => this.onCardEvent(event));
  }

  // ── Lifecycle ─────────────────────────────────────────────────────────────

  get state(): SessionState {
    return this._state;
  }

  get startedAt(): Date | null {
    return this._startedAt;
  }

  get endedAt(): Date | null {
    return this._endedAt;
  }

  start(): void {
    if (this._state !== "unstarted") {
      throw new Error(`LearnSession.start() may only be called once (session is ${this._state}).`);
    }

    this._state = "running";
    this._startedAt = this.now();

    // Park every card in reserve, then take exactly as many as the limit allows.
    const limit = this.settings.cardLimit;
    if (limit.enabled && this.active.size > limit.value) {
      this.reserve = this.active;
      this.active = this.reserve.partition(limit.value);
    }

    const timeLimit = this.settings.timeLimit;
    if (timeLimit.enabled) this.armTimeLimit(timeLimit.minutes * MS_MINUTE);

    log.debug(`Session started: ${this.active.size} active, ${this.reserve.size} in reserve.`);
    this.gotoNextCard();
  }

  /** Ends the session. Calling it again, or after the session ended by itself, does nothing. */
  end(): void {
    if (this._state === "ended") return;

    this._state = "ended";
    this._endedAt = this.now();
    this.unsubscribe?.();
    this.unsubscribe = null;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.infos.clear();

    log.debug(`Session ended: ${this.learned.size} learned, ${this.everFailed.size} failed.`);
    this.provider.sessionEnded(this);
  }

  /** Asks the session to stop. Takes effect the next time a card would be drawn. */
  quit(): void {
    this.quitRequested = true;
  }

  isQuit(): boolean {
    const limit = this.settings.cardLimit;
    const limitReached = limit.enabled && this.learned.size >= limit.value;
    return this.quitRequested || this.active.isEmpty() || limitReached;
  }

  /** Worth keeping in the learn history: something was learned or failed. */
  isRelevant(): boolean {
    return this.everFailed.size > 0 || this.learned.size > 0;
  }

  // ── Answers ───────────────────────────────────────────────────────────────

  get currentCard(): C {
    return this.requireCurrent("currentCard").card;
  }

  /** Shadow level the current card is drawn at; differs from its level when shuffled. */
  get currentShuffleLevel(): number {
    return this.requireCurrent("currentShuffleLevel").level;
  }

  /**
   * Applies a pass or fail to the current card. The next card is drawn when the
   * resulting card event comes back, not by this method.
   */
  cardChecked(passed: boolean, shownFlipped: boolean): void {
    const info = this.requireCurrent("cardChecked");
    const card = info.card;
    log.debug("cardChecked:", passed ? "passed" : "failed", card);
    this.assertIsActiveCurrent(info);

    this.skipped.delete(card);
    this.partiallyLearned.delete(card);

    if (passed) {
      if (this.settings.sidesMode === "both" && this.markPartiallyLearned(info, shownFlipped)) {
        log.debug("...partially passed.");
      } else {
        log.debug("...passed.");
        this.raiseCardLevel(info);
      }
    } else {
      if (!this.settings.retestFailedCards) this.active.remove(info);

      if (card.level > 0) {
        this.everFailed.add(card);
        log.debug("...failed.");
      }

      // The reset re-enters onCardEvent, which re-sorts the card to its new level
      // before drawing the next one.
      info.shuffled = false;
      this.mutator.resetLevel(card, this.sessionStart());
      this.resyncShadowLevel(info);
    }

    log.debug(
      `...cards remaining: ${this.active.size}, partially learned: ${this.partiallyLearned.size}, failed: ${this.everFailed.size}`,
    );
  }

  /**
   * Postpones the current card. With cards in reserve it swaps places with one of
   * them; otherwise it stays active but is not drawn again until the current pass
   * is over.
   */
  cardSkipped(): void {
    const info = this.requireCurrent("cardSkipped");
    const card = info.card;
    log.debug("cardSkipped:", card);
    this.assertIsActiveCurrent(info);

    this.skipped.add(card);

    if (!this.reserve.isEmpty()) {
      this.partiallyLearned.delete(card);

      const replacement = this.reserve.loopIterator().next();
      const replacementCard = replacement.card;
      if (replacementCard.getLearnedAmount("front") > 0 || replacementCard.getLearnedAmount("back") > 0) {
        this.partiallyLearned.add(replacementCard);
      }

      this.reserve.remove(replacement);
      this.active.add(replacement);
      this.active.remove(info);
      this.reserve.addExpired(info);

      log.debug("Moving to reserve:", card);
      log.debug("Moving to active:", replacementCard);
    }

    log.debug(`...cards remaining: ${this.active.size}`);
    this.mutator.reappend(card);
  }

  // ── Card events ───────────────────────────────────────────────────────────

  /**
   * Entry point for change notifications from the category tree. Events for cards
   * this session does not know, or that arrive after it ended, are ignored.
   */
  onCardEvent(event: CardEvent<C>): void {
    if (this._state === "ended") return;

    const info = this.infos.get(event.card);
    if (!info) return;

    switch (event.type) {
      case "added": {
        if (this.active.contains(info) || this.reserve.contains(info)) return;
        this.resyncShadowLevel(info);

        // Before start() every candidate is active; start() applies the card limit.
        const limit = this.settings.cardLimit;
        const inPlay = this.learned.size + this.active.size;
        if (this._state === "running" && limit.enabled && inPlay >= limit.value) this.reserve.add(info);
        else this.active.add(info);
        break;
      }

      case "removed": {
        const card = info.card;
        this.active.remove(info);
        this.reserve.remove(info);
        this.learned.delete(card);
        this.partiallyLearned.delete(card);
        this.everFailed.delete(card);
        this.skipped.delete(card);

        const idx = this.checked.indexOf(card);
        if (idx >= 0) this.checked.splice(idx, 1);

        if (info === this.current) this.gotoNextCard();
        break;
      }

      case "deckChanged": {
        this.resyncShadowLevel(info);
        if (info === this.current) this.gotoNextCard();
        break;
      }
    }
  }

  // ── Observers ─────────────────────────────────────────────────────────────

  /** Observers are notified in registration order. Returns an unsubscribe function. */
  addObserver(observer: LearnCardObserver<C>): () => void {
    this.observers.push(observer);
    return () => this.removeObserver(observer);
  }

  removeObserver(observer: LearnCardObserver<C>): void {
    const idx = this.observers.indexOf(observer);
    if (idx >= 0) this.observers.splice(idx, 1);
  }

  // ── Snapshots ─────────────────────────────────────────────────────────────

  /** Cards that can still be drawn. */
  get cardsLeft(): ReadonlySet<C> {
    return toCardSet(this.active);
  }

  get reserveCards(): ReadonlySet<C> {
    return toCardSet(this.reserve);
  }

  get learnedCards(): ReadonlySet<C> {
    return new Set(this.learned);
  }

  /** Learned without ever failing. */
  get passedCards(): ReadonlySet<C> {
    return new Set([...this.learned].filter((c) => !this.everFailed.has(c)));
  }

  /** Failed and not learned afterwards. */
  get failedCards(): ReadonlySet<C> {
    return new Set([...this.everFailed].filter((c) => !this.learned.has(c)));
  }

  /** Failed, then learned. */
  get relearnedCards(): ReadonlySet<C> {
    return new Set([...this.everFailed].filter((c) => this.learned.has(c)));
  }

  get skippedCards(): ReadonlySet<C> {
    return new Set(this.skipped);
  }

  get partiallyLearnedCards(): ReadonlySet<C> {
    return new Set(this.partiallyLearned);
  }

  /** Every card shown, ordered by when it was last shown; skipped cards included. */
  get checkedCards(): readonly C[] {
    return [...this.checked];
  }

  get learnedCount(): number {
    return this.learned.size;
  }

  get partiallyLearnedCount(): number {
    return this.partiallyLearned.size;
  }

  // ── Internals ─────────────────────────────────────────────────────────────

  /** Timers cannot hold more than MAX_TIMER_DELAY_MS, so long limits re-arm in steps. */
  private armTimeLimit(remainingMs: number): void {
    const delay = Math.min(remainingMs, MAX_TIMER_DELAY_MS);
    this.timer = setTimeout(() => {
      if (remainingMs > delay) this.armTimeLimit(remainingMs - delay);
      else this.quit();
    }, delay);
    this.timer.unref();
  }

  private gotoNextCard(): void {
    if (this.isQuit()) {
      this.end();
      return;
    }

    const last = this.current;
    const draw = this.active.loopIterator();
    let next = draw.next();
    // Avoid showing the same card twice in a row when there is a choice.
    if (this.active.size > 1 && next === last) next = draw.next();
    this.current = next;

    const card = next.card;
    const idx = this.checked.indexOf(card);
    if (idx >= 0) this.checked.splice(idx, 1);
    this.checked.push(card);

    const flipped = shouldShowFlipped(this.settings, card, this.random);
    for (const observer of [...this.observers]) observer.nextCardFetched(card, flipped);
  }

  /**
   * Both-sides mode: records a correct answer for the side just tested. Returns
   * true if the card still needs more answers on either side.
   */
  private markPartiallyLearned(info: CardInfo<C>, shownFlipped: boolean): boolean {
    const card = info.card;
    const tested: CardSide = shownFlipped ? "back" : "front";
    const target = this.settings.amountToTest;

    const front = card.getLearnedAmount("front") + (tested === "front" ? 1 : 0);
    const back = card.getLearnedAmount("back") + (tested === "back" ? 1 : 0);
    if (front >= target.front && back >= target.back) return false;

    this.partiallyLearned.add(card);
    // Emits deckChanged, which draws the next card.
    this.mutator.incrementLearnedAmount(card, tested);
    return true;
  }

  private raiseCardLevel(info: CardInfo<C>): void {
    const card = info.card;
    this.active.remove(info);
    this.learned.add(card);

    const start = this.sessionStart();
    const expiresAt = expirationDate(this.settings, start, card.level);
    this.mutator.raiseLevel(card, start, expiresAt);
  }

  /** Moves a card whose real level changed to its new equivalence class. */
  private resyncShadowLevel(info: CardInfo<C>): void {
    if (!info.isStale()) return;
    info.syncLevel();
    if (this.active.contains(info)) this.active.resetEquivalenceClass(info);
    else if (this.reserve.contains(info)) this.reserve.resetEquivalenceClass(info);
  }

  private requireCurrent(operation: string): CardInfo<C> {
    if (this._state !== "running") {
      throw new Error(`${operation} is only available while the session is running (session is ${this._state}).`);
    }
    invariant(this.current, "a running session always has a current card");
    return this.current;
  }

  private assertIsActiveCurrent(info: CardInfo<C>): void {
    invariant(!this.learned.has(info.card), "current card is already learned");
    invariant(!this.reserve.contains(info), "current card is in reserve");
    invariant(this.active.contains(info), "current card is not active");
  }

  private sessionStart(): Date {
    invariant(this._startedAt, "session has a start time once running");
    return this._startedAt;
  }

  private fetchCards(selected: readonly C[], learnUnlearned: boolean, learnExpired: boolean): CardInfo<C>[] {
    const cards: C[] = [];
    if (learnUnlearned) cards.push(...this.category.getUnlearnedCards());
    if (learnExpired) cards.push(...this.category.getExpiredCards(this.now()));
    if (!learnUnlearned && !learnExpired) cards.push(...selected);

    const infos: CardInfo<C>[] = [];
    const levels: number[] = [];
    for (const card of cards) {
      if (this.infos.has(card)) continue;
      const info = new CardInfo(card);
      this.infos.set(card, info);
      infos.push(info);
      if (!levels.includes(card.level)) levels.push(card.level);
    }

    // Move a share of the cards to a different, randomly chosen level.
    const shuffledCount = Math.floor(this.settings.shuffleRatio * infos.length);
    if (levels.length > 1) {
      const pool = [...infos];
      for (let i = 0; i < shuffledCount; i++) {
        const [info] = pool.splice(randomInt(this.random, pool.length), 1);
        const otherLevels = levels.filter((l) => l !== info.card.level);
        info.level = otherLevels[randomInt(this.random, otherLevels.length)];
        info.shuffled = true;
      }
    }

    return infos;
  }

  /** Category -> position in which its cards are drawn when grouping by category. */
  private createCategoryGroupOrder(): CategoryGroupOrder {
    const categories: object[] = this.category.getSubtreeList();
    if (this.settings.categoryOrder === "random") shuffleInPlace(categories, this.random);

    const order = new Map<object | null, number>();
    categories.forEach((category, i) => order.set(category, i));
    order.set(null, categories.length);
    return order;
  }
}

function toCardSet<C extends LearnCard>(infos: Iterable<CardInfo<C>>): Set<C> {
  const out = new Set<C>();
  for (const info of infos) out.add(info.card);
  return out;
}
