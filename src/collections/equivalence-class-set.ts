// src/collections/equivalence-class-set.ts
// ---------------------------------------------------------------------------
// Partitioned random-draw set. Elements are bucketed into ordered equivalence
// classes by a comparator (elements comparing equal share a class) and drawn
// from the lowest class first, in random order within a class, without
// repeating an element until every element has been drawn once ("a pass").
//
// Membership is by object identity; the comparator key may change, in which
// case the owner calls resetEquivalenceClass().
// ---------------------------------------------------------------------------

import { randomInt, shuffleInPlace, type RandomSource } from "../core/utils";

export type Comparator<T> = (a: T, b: T) => number;

/** Infinite, restartable draw sequence over an EquivalenceClassSet. */
export interface LoopIterator<T> {
  next(): T;
}

export class EquivalenceClassSet<T> implements Iterable<T> {
  readonly comparator: Comparator<T>;
  private readonly random: RandomSource;

  // Non-empty classes in ascending order.
  private readonly classes: T[][] = [];
  // Element -> the class array it currently lives in. Insertion-ordered.
  private readonly classOf = new Map<T, T[]>();
  // Elements already handed out in the current pass.
  private readonly drawn = new Set<T>();

  constructor(comparator: Comparator<T>, random: RandomSource = Math.random) {
    this.comparator = comparator;
    this.random = random;
  }

  get size(): number {
    return this.classOf.size;
  }

  isEmpty(): boolean {
    return this.classOf.size === 0;
  }

  contains(element: T): boolean {
    return this.classOf.has(element);
  }

  /** Adds an element; it is drawable in the current pass. No-op if already present. */
  add(element: T): void {
    if (this.classOf.has(element)) return;

    let i = 0;
    while (i < this.classes.length && this.comparator(element, this.classes[i][0]) > 0) i++;

    const existing = this.classes[i];
    if (existing && this.comparator(element, existing[0]) === 0) {
      existing.push(element);
      this.classOf.set(element, existing);
    } else {
      const created = [element];
      this.classes.splice(i, 0, created);
      this.classOf.set(element, created);
    }
  }

  addAll(elements: Iterable<T>): void {
    for (const el of elements) this.add(el);
  }

  /**
   * Adds an element that counts as already drawn, so it is not offered again
   * until the current pass is over.
   */
  addExpired(element: T): void {
    this.add(element);
    this.drawn.add(element);
  }

  remove(element: T): boolean {
    const cls = this.classOf.get(element);
    if (!cls) return false;

    cls.splice(cls.indexOf(element), 1);
    if (cls.length === 0) this.classes.splice(this.classes.indexOf(cls), 1);

    this.classOf.delete(element);
    this.drawn.delete(element);
    return true;
  }

  /**
   * Moves `element` to the class its (changed) comparator key now puts it in.
   * Draw state is kept: a pending element stays pending, a drawn one stays drawn.
   */
  resetEquivalenceClass(element: T): void {
    if (!this.classOf.has(element)) {
      throw new Error("resetEquivalenceClass: element is not a member of this set");
    }
    const wasDrawn = this.drawn.has(element);
    this.remove(element);
    this.add(element);
    if (wasDrawn) this.drawn.add(element);
  }

  loopIterator(): LoopIterator<T> {
    return { next: () => this.drawNext() };
  }

  /**
   * Removes `n` elements, taken in draw order (lowest classes first, elements
   * still pending in this pass before already-drawn ones), and returns them as
   * a new set sharing this set's comparator and random source.
   */
  partition(n: number): EquivalenceClassSet<T> {
    const taken = this.drawOrder().slice(0, Math.max(0, Math.floor(n)));
    const out = new EquivalenceClassSet<T>(this.comparator, this.random);
    for (const el of taken) {
      this.remove(el);
      out.add(el);
    }
    return out;
  }

  values(): IterableIterator<T> {
    return this.classOf.keys();
  }

  [Symbol.iterator](): IterableIterator<T> {
    return this.classOf.keys();
  }

  private drawNext(): T {
    if (this.classes.length === 0) {
      throw new Error("Cannot draw from an empty EquivalenceClassSet");
    }

    for (const cls of this.classes) {
      const pending = cls.filter((el) => !this.drawn.has(el));
      if (pending.length > 0) return this.take(pending);
    }

    // Pass complete: start over from the lowest class.
    this.drawn.clear();
    return this.take(this.classes[0]);
  }

  private take(candidates: T[]): T {
    const picked = candidates[randomInt(this.random, candidates.length)];
    this.drawn.add(picked);
    return picked;
  }

  private drawOrder(): T[] {
    const pending: T[] = [];
    const drawn: T[] = [];
    for (const cls of this.classes) {
      pending.push(...shuffleInPlace(cls.filter((el) => !this.drawn.has(el)), this.random));
    }
    for (const cls of this.classes) {
      drawn.push(...shuffleInPlace(cls.filter((el) => this.drawn.has(el)), this.random));
    }
    return [...pending, ...drawn];
  }
}
