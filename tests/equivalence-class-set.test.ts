// tests/equivalence-class-set.test.ts
// ---------------------------------------------------------------------------
// Tests for src/collections/equivalence-class-set.ts — the partitioned
// random-draw set the learn session draws cards from.
// Covers: class ordering, the no-repeat pass contract, addExpired, removal,
// reclassification and partition().
// ---------------------------------------------------------------------------

import { describe, it, expect } from "vitest";
import { EquivalenceClassSet } from "../src/collections/equivalence-class-set";

// ── Helpers ─────────────────────────────────────────────────────────────────

type Item = { name: string; key: number };

const byKey = (a: Item, b: Item) => a.key - b.key;
const alwaysFirst = () => 0;

function item(name: string, key: number): Item {
  return { name, key };
}

function draw(set: EquivalenceClassSet<Item>, n: number): string[] {
  const it = set.loopIterator();
  return Array.from({ length: n }, () => it.next().name);
}

// ── Membership ──────────────────────────────────────────────────────────────

describe("membership", () => {
  it("tracks size, contains and isEmpty by identity", () => {
    const set = new EquivalenceClassSet<Item>(byKey);
    const a = item("a", 0);
    expect(set.isEmpty()).toBe(true);

    set.add(a);
    set.add(a);
    expect(set.size).toBe(1);
    expect(set.contains(a)).toBe(true);
    expect(set.contains(item("a", 0))).toBe(false);

    expect(set.remove(a)).toBe(true);
    expect(set.remove(a)).toBe(false);
    expect(set.isEmpty()).toBe(true);
  });

  it("iterates members in insertion order", () => {
    const set = new EquivalenceClassSet<Item>(byKey);
    const items = [item("b", 1), item("a", 0), item("c", 2)];
    set.addAll(items);
    expect([...set].map((i) => i.name)).toEqual(["b", "a", "c"]);
  });

  it("exposes the comparator it was built with", () => {
    const set = new EquivalenceClassSet<Item>(byKey);
    expect(set.comparator).toBe(byKey);
  });
});

// ── Drawing ─────────────────────────────────────────────────────────────────

describe("loopIterator", () => {
  it("throws when drawing from an empty set", () => {
    const set = new EquivalenceClassSet<Item>(byKey);
    expect(() => set.loopIterator().next()).toThrow("empty");
  });

  it("drains the lowest class before moving to the next", () => {
    const set = new EquivalenceClassSet<Item>(byKey);
    set.addAll([item("high", 1), item("low1", 0), item("low2", 0)]);

    const [first, second, third] = draw(set, 3);
    expect([first, second].sort()).toEqual(["low1", "low2"]);
    expect(third).toBe("high");
  });

  it("yields every element of a class once before repeating any", () => {
    const set = new EquivalenceClassSet<Item>(byKey);
    set.addAll([item("a", 0), item("b", 0), item("c", 0), item("d", 0)]);

    const names = draw(set, 5);
    expect(names.slice(0, 4).sort()).toEqual(["a", "b", "c", "d"]);
    expect(["a", "b", "c", "d"]).toContain(names[4]);
  });

  it("restarts from the lowest class after a full pass", () => {
    const set = new EquivalenceClassSet<Item>(byKey, alwaysFirst);
    set.addAll([item("low", 0), item("high", 1)]);
    expect(draw(set, 4)).toEqual(["low", "high", "low", "high"]);
  });

  it("shares pass state between iterators of the same set", () => {
    const set = new EquivalenceClassSet<Item>(byKey, alwaysFirst);
    set.addAll([item("a", 0), item("b", 0)]);
    expect(set.loopIterator().next().name).toBe("a");
    expect(set.loopIterator().next().name).toBe("b");
  });

  it("never draws an element after it was removed", () => {
    const set = new EquivalenceClassSet<Item>(byKey);
    const a = item("a", 0);
    set.addAll([a, item("b", 0)]);
    set.remove(a);
    expect(draw(set, 3)).toEqual(["b", "b", "b"]);
  });

  it("lets elements added mid-pass be drawn in the same pass", () => {
    const set = new EquivalenceClassSet<Item>(byKey, alwaysFirst);
    set.addAll([item("a", 0), item("b", 1)]);
    expect(draw(set, 1)).toEqual(["a"]);

    set.add(item("late", 0));
    expect(draw(set, 2)).toEqual(["late", "b"]);
  });
});

describe("addExpired", () => {
  it("holds the element back until the current pass is over", () => {
    const set = new EquivalenceClassSet<Item>(byKey);
    set.addAll([item("a", 0), item("b", 0)]);

    const [first] = draw(set, 1);
    set.addExpired(item("expired", 0));
    const [second] = draw(set, 1);

    expect([first, second].sort()).toEqual(["a", "b"]);
    expect(set.size).toBe(3);
  });

  it("makes the element drawable again in the next pass", () => {
    const set = new EquivalenceClassSet<Item>(byKey, alwaysFirst);
    set.add(item("a", 0));
    set.addExpired(item("expired", 0));

    expect(draw(set, 3)).toEqual(["a", "a", "expired"]);
  });
});

describe("resetEquivalenceClass", () => {
  it("moves an element to the class of its new key and keeps its drawn state", () => {
    const set = new EquivalenceClassSet<Item>(byKey, alwaysFirst);
    const a = item("a", 0);
    set.addAll([a, item("b", 0), item("c", 1)]);

    expect(draw(set, 1)).toEqual(["a"]);
    a.key = 1;
    set.resetEquivalenceClass(a);

    // a is in class 1 now but was already drawn this pass.
    expect(draw(set, 3)).toEqual(["b", "c", "b"]);
  });

  it("lets a pending element be drawn at its new position", () => {
    const set = new EquivalenceClassSet<Item>(byKey, alwaysFirst);
    const moved = item("moved", 5);
    set.addAll([item("a", 1), moved]);

    moved.key = 0;
    set.resetEquivalenceClass(moved);
    expect(draw(set, 2)).toEqual(["moved", "a"]);
  });

  it("rejects elements that are not members", () => {
    const set = new EquivalenceClassSet<Item>(byKey);
    expect(() => set.resetEquivalenceClass(item("x", 0))).toThrow("not a member");
  });
});

// ── Partition ───────────────────────────────────────────────────────────────

describe("partition", () => {
  it("moves the n lowest elements into a new set", () => {
    const set = new EquivalenceClassSet<Item>(byKey);
    set.addAll([item("two", 2), item("zeroA", 0), item("one", 1), item("zeroB", 0)]);

    const taken = set.partition(2);

    expect([...taken].map((i) => i.name).sort()).toEqual(["zeroA", "zeroB"]);
    expect([...set].map((i) => i.name).sort()).toEqual(["one", "two"]);
    expect(taken.comparator).toBe(set.comparator);
  });

  it("takes elements still pending in this pass before drawn ones", () => {
    const set = new EquivalenceClassSet<Item>(byKey);
    const items = [item("a", 0), item("b", 0), item("c", 1)];
    set.addAll(items);

    const [drawnName] = draw(set, 1);
    const taken = set.partition(1);

    const otherLow = drawnName === "a" ? "b" : "a";
    expect([...taken].map((i) => i.name)).toEqual([otherLow]);
    expect([...set].map((i) => i.name).sort()).toEqual([drawnName, "c"].sort());
  });

  it("moves everything when n is at least the size", () => {
    const set = new EquivalenceClassSet<Item>(byKey);
    set.addAll([item("a", 0), item("b", 3)]);

    const taken = set.partition(10);
    expect(taken.size).toBe(2);
    expect(set.isEmpty()).toBe(true);
  });

  it("returns an empty set for n = 0", () => {
    const set = new EquivalenceClassSet<Item>(byKey);
    set.add(item("a", 0));
    expect(set.partition(0).size).toBe(0);
    expect(set.size).toBe(1);
  });
});
