import { describe, it, expect } from "vitest";
import {
  createItem,
  easinessDelta,
  isDue,
  resetItem,
  schedule,
  addDays,
  cloneItem,
  MAX_EASINESS,
  MAX_INTERVAL,
  MIN_EASINESS,
  MIN_INTERVAL,
  type Item,
} from "./scheduler.js";
import { ContractViolationError } from "./errors.js";

const NOW = new Date("2026-03-01T12:00:00.000Z");

describe("createItem", () => {
  it("starts with the initial scheduling metadata", () => {
    const item = createItem({ id: "a", front: "hola", back: "hello" }, NOW);
    expect(item).toEqual({
      id: "a",
      front: "hola",
      back: "hello",
      collectionId: null,
      language: "en",
      tags: [],
      createdAt: NOW,
      interval: 1.0,
      easiness: 2.5,
      reviewCount: 0,
      due: null,
    });
  });
});

describe("easinessDelta", () => {
  it("rewards perfect recall and punishes blackouts", () => {
    expect(easinessDelta(5)).toBeCloseTo(0.1);
    expect(easinessDelta(4)).toBeCloseTo(0);
    expect(easinessDelta(3)).toBeCloseTo(-0.14);
    expect(easinessDelta(0)).toBeCloseTo(-0.8);
  });
});

describe("schedule", () => {
  it("grows the interval 1 -> 6 -> 6 * easiness on three perfect answers", () => {
    const item = createItem({ id: "a", front: "hola", back: "hello" }, NOW);

    schedule(item, 5, NOW);
    expect(item.reviewCount).toBe(1);
    expect(item.interval).toBe(1.0);
    expect(item.easiness).toBeCloseTo(2.6);

    schedule(item, 5, NOW);
    expect(item.reviewCount).toBe(2);
    expect(item.interval).toBe(6.0);
    expect(item.easiness).toBeCloseTo(2.7);

    // Uses the easiness from before this review (2.7), not the updated 2.8
    schedule(item, 5, NOW);
    expect(item.reviewCount).toBe(3);
    expect(item.interval).toBeCloseTo(16.2);
    expect(item.easiness).toBeCloseTo(2.8);
  });

  it("cuts the interval to a fifth on a failed recall", () => {
    const item = createItem(
      { id: "a", front: "hola", back: "hello", interval: 6.0, easiness: 2.5, reviewCount: 2 },
      NOW
    );

    schedule(item, 0, NOW);

    expect(item.interval).toBeCloseTo(1.2);
    expect(item.easiness).toBeCloseTo(1.7);
    expect(item.reviewCount).toBe(3);
    expect(item.due?.getTime()).toBe(addDays(NOW, item.interval).getTime());
  });

  it("keeps easiness and interval within bounds", () => {
    const low = createItem({ id: "a", front: "a", back: "b", interval: 0.5, easiness: MIN_EASINESS }, NOW);
    schedule(low, 0, NOW);
    expect(low.easiness).toBe(MIN_EASINESS);
    expect(low.interval).toBe(MIN_INTERVAL);

    const high = createItem({ id: "b", front: "a", back: "b", easiness: MAX_EASINESS }, NOW);
    schedule(high, 5, NOW);
    expect(high.easiness).toBe(MAX_EASINESS);
  });

  it("stays in bounds along every rating sequence", () => {
    const starts = [
      createItem({ id: "new", front: "a", back: "b" }, NOW),
      createItem({ id: "floor", front: "a", back: "b", interval: MIN_INTERVAL, easiness: MIN_EASINESS, reviewCount: 5 }, NOW),
      createItem({ id: "ceiling", front: "a", back: "b", interval: 3000, easiness: MAX_EASINESS, reviewCount: 12 }, NOW),
    ];
    let steps = 0;

    const walk = (item: Item, depth: number): void => {
      if (depth === 0) return;
      for (let rating = 0; rating <= 5; rating++) {
        const next = schedule(cloneItem(item), rating, NOW);
        steps++;
        expect(next.easiness).toBeGreaterThanOrEqual(MIN_EASINESS);
        expect(next.easiness).toBeLessThanOrEqual(MAX_EASINESS);
        expect(next.interval).toBeGreaterThanOrEqual(MIN_INTERVAL);
        expect(next.interval).toBeLessThanOrEqual(MAX_INTERVAL);
        expect(Number.isNaN(next.due?.getTime())).toBe(false);
        walk(next, depth - 1);
      }
    };

    for (const start of starts) walk(start, 5);
    // 6 + 36 + 216 + 1296 + 7776 calls per start
    expect(steps).toBe(3 * 9330);
  });

  it("caps the interval so due stays a real date", () => {
    const item = createItem({ id: "a", front: "a", back: "b", interval: 5e7, reviewCount: 4 }, NOW);

    schedule(item, 5, NOW);

    expect(item.interval).toBe(MAX_INTERVAL);
    expect(item.due).toEqual(addDays(NOW, MAX_INTERVAL));
    expect(isDue(item, addDays(NOW, MAX_INTERVAL))).toBe(true);
  });

  it("sets due to now plus the new interval", () => {
    const item = createItem({ id: "a", front: "hola", back: "hello" }, NOW);
    schedule(item, 4, NOW);
    expect(item.due).toEqual(new Date("2026-03-02T12:00:00.000Z"));
  });

  it("returns the same item it was given", () => {
    const item = createItem({ id: "a", front: "hola", back: "hello" }, NOW);
    expect(schedule(item, 3, NOW)).toBe(item);
  });

  it.each([6, -1, 2.5, Number.NaN])("rejects rating %s without touching the item", (rating) => {
    const item = createItem({ id: "a", front: "hola", back: "hello" }, NOW);
    expect(() => schedule(item, rating, NOW)).toThrow(ContractViolationError);
    expect(item.reviewCount).toBe(0);
    expect(item.due).toBeNull();
  });
});

describe("isDue", () => {
  it("treats never-scheduled items as due", () => {
    expect(isDue(createItem({ id: "a", front: "a", back: "b" }, NOW), NOW)).toBe(true);
  });

  it("compares due against now inclusively", () => {
    const item = createItem({ id: "a", front: "a", back: "b", due: NOW }, NOW);
    expect(isDue(item, NOW)).toBe(true);
    expect(isDue(item, new Date(NOW.getTime() - 1))).toBe(false);
  });
});

describe("resetItem", () => {
  it("restores initial metadata and schedules for tomorrow", () => {
    const item = createItem(
      { id: "a", front: "a", back: "b", interval: 20, easiness: 3.1, reviewCount: 7, due: null },
      NOW
    );
    resetItem(item, NOW);
    expect(item.interval).toBe(1.0);
    expect(item.easiness).toBe(2.5);
    expect(item.reviewCount).toBe(0);
    expect(item.due).toEqual(new Date("2026-03-02T12:00:00.000Z"));
  });
});
