import { assertRecallRating, type RecallRating } from "./recall.js";

// SM-2 scheduling constants
export const MIN_EASINESS = 1.3;
export const MAX_EASINESS = 5.0;
export const INITIAL_EASINESS = 2.5;
export const INITIAL_INTERVAL = 1.0;
export const SECOND_INTERVAL = 6.0;
export const MIN_INTERVAL = 0.2;
// A hundred years; keeps `due` a representable date
export const MAX_INTERVAL = 36500;
// Interval multiplier applied on a failed recall
export const FAILURE_INTERVAL_FACTOR = 0.2;

const DAY_MS = 24 * 60 * 60 * 1000;

export interface Item {
  id: string;
  collectionId: string | null;
  front: string;
  back: string;
  language: string;
  tags: string[];
  createdAt: Date;
  // Days between the last review and the next one
  interval: number;
  easiness: number;
  reviewCount: number;
  // null means never scheduled: due right away
  due: Date | null;
}

export type NewItemFields = Pick<Item, "id" | "front" | "back"> &
  Partial<Omit<Item, "id" | "front" | "back">>;

export function createItem(fields: NewItemFields, now: Date = new Date()): Item {
  return {
    collectionId: null,
    language: "en",
    tags: [],
    createdAt: now,
    interval: INITIAL_INTERVAL,
    easiness: INITIAL_EASINESS,
    reviewCount: 0,
    due: null,
    ...fields,
  };
}

export function cloneItem(item: Item): Item {
  return {
    ...item,
    tags: [...item.tags],
    createdAt: new Date(item.createdAt.getTime()),
    due: item.due ? new Date(item.due.getTime()) : null,
  };
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * DAY_MS);
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

export function easinessDelta(rating: RecallRating): number {
  const miss = 5 - rating;
  return 0.1 - miss * (0.08 + miss * 0.02);
}

/**
 * Apply one graded review to an item (SuperMemo-2).
 *
 * Mutates and returns `item`. The new interval is computed from the interval
 * and easiness the item had *before* this review; the updated easiness only
 * affects the next call.
 */
export function schedule(item: Item, rating: number, now: Date = new Date()): Item {
  const quality = assertRecallRating(rating);
  const previousEasiness = item.easiness;
  const previousInterval = item.interval;

  item.reviewCount += 1;
  item.easiness = clamp(previousEasiness + easinessDelta(quality), MIN_EASINESS, MAX_EASINESS);

  let interval: number;
  if (quality < 3) {
    interval = Math.max(MIN_INTERVAL, previousInterval * FAILURE_INTERVAL_FACTOR);
  } else if (item.reviewCount === 1) {
    interval = INITIAL_INTERVAL;
  } else if (item.reviewCount === 2) {
    interval = SECOND_INTERVAL;
  } else {
    interval = previousInterval * previousEasiness;
  }

  item.interval = Math.min(interval, MAX_INTERVAL);
  item.due = addDays(now, item.interval);
  return item;
}

export function isDue(item: Item, now: Date = new Date()): boolean {
  return item.due === null || item.due.getTime() <= now.getTime();
}

// Put an item back to its never-reviewed metadata, due tomorrow
export function resetItem(item: Item, now: Date = new Date()): Item {
  item.interval = INITIAL_INTERVAL;
  item.easiness = INITIAL_EASINESS;
  item.reviewCount = 0;
  item.due = addDays(now, 1);
  return item;
}
