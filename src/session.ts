import { cloneItem, isDue, schedule, type Item } from "./scheduler.js";
import { ratingToString, type RecallRating } from "./recall.js";
import { createTrainer, type GradeResult, type Trainer, type TrainerMode, type TrainerPrompt } from "./trainer.js";
import type { SentenceGenerator } from "./generator.js";
import { ContractViolationError, GenerationUnavailableError, errorMessage, type GenerationFailureReason } from "./errors.js";

export const DEFAULT_MAX_ITEMS = 20;

// empty: nothing loaded; ready: waiting for advance; presenting: waiting for grade;
// exhausted: queue drained; ended: summary emitted, terminal
export type SessionState = "empty" | "ready" | "presenting" | "exhausted" | "ended";

export interface Progress {
  current: number;
  total: number;
}

export type PresentationPayload = TrainerPrompt & { progress: Progress };

export type AdvanceFailureReason = GenerationFailureReason | "render_failed";

export interface AdvanceFailure {
  mode: "error";
  itemId: string;
  trainerMode: TrainerMode;
  reason: AdvanceFailureReason;
  error: string;
  progress: Progress;
}

export type AdvanceResult = PresentationPayload | AdvanceFailure | null;

export interface SessionCounters {
  reviewed: number;
  correct: number;
  incorrect: number;
  remaining: number;
}

export interface GradeOutcome extends GradeResult {
  // Updated copy, already handed to `persist` when one was given
  item: Item;
  progress: SessionCounters;
}

export interface ReviewedEntry {
  item: Item;
  rating: RecallRating;
}

export interface SessionSummary {
  userId: string;
  collectionId: string | null;
  mode: TrainerMode;
  startedAt: Date;
  itemsReviewed: number;
  correct: number;
  incorrect: number;
  accuracy: number;
  durationSeconds: number;
}

export interface SessionSnapshot extends SessionCounters {
  userId: string;
  collectionId: string | null;
  mode: TrainerMode;
  state: SessionState;
  startedAt: Date;
  currentItemId: string | null;
}

export interface ReviewSessionOptions {
  userId: string;
  mode: TrainerMode;
  collectionId?: string | null;
  maxItems?: number;
  generator?: SentenceGenerator | null;
  distractorCount?: number;
  random?: () => number;
  clock?: () => Date;
}

export function isAdvanceFailure(result: AdvanceResult): result is AdvanceFailure {
  return result !== null && result.mode === "error";
}

/**
 * Order due items for review: never-reviewed items first (input order), then
 * reviewed items from most to least overdue, capped at `maxItems`.
 */
export function orderDueItems(items: readonly Item[], now: Date, maxItems: number = DEFAULT_MAX_ITEMS): Item[] {
  const due = items.filter((item) => isDue(item, now));
  const fresh = due.filter((item) => item.reviewCount === 0);
  const seen = due
    .filter((item) => item.reviewCount > 0)
    .sort((a, b) => (a.due ?? now).getTime() - (b.due ?? now).getTime());

  return [...fresh, ...seen].slice(0, Math.max(0, maxItems));
}

export class ReviewSession {
  readonly userId: string;
  readonly collectionId: string | null;
  readonly startedAt: Date;

  private mode: TrainerMode;
  private state: SessionState = "empty";
  private queue: Item[] = [];
  private currentItem: Item | null = null;
  private trainer: Trainer | null = null;
  private readonly reviewed: ReviewedEntry[] = [];
  private correct = 0;
  private incorrect = 0;
  private summary: SessionSummary | null = null;

  private readonly maxItems: number;
  private readonly clock: () => Date;

  constructor(private readonly options: ReviewSessionOptions) {
    this.userId = options.userId;
    this.collectionId = options.collectionId ?? null;
    this.mode = options.mode;
    this.maxItems = options.maxItems ?? DEFAULT_MAX_ITEMS;
    this.clock = options.clock ?? (() => new Date());
    this.startedAt = this.clock();
  }

  get trainerMode(): TrainerMode {
    return this.mode;
  }

  get currentState(): SessionState {
    return this.state;
  }

  get remaining(): number {
    return this.queue.length;
  }

  /**
   * Replace the queue with the due subset of `items`. Items are copied, so
   * nothing the caller holds changes until it persists a graded item.
   */
  loadQueue(items: readonly Item[], now: Date = this.clock()): number {
    this.assertNotEnded("loadQueue");
    if (this.state === "presenting") {
      throw new ContractViolationError("Cannot reload the queue while an item is being presented");
    }

    this.queue = orderDueItems(items, now, this.maxItems).map(cloneItem);
    this.state = "ready";
    console.info(`Loaded ${this.queue.length} due item(s) out of ${items.length} for user ${this.userId}`);
    return this.queue.length;
  }

  // Switch trainer for the next advance, e.g. after a cloze failure
  setMode(mode: TrainerMode): void {
    this.assertNotEnded("setMode");
    if (this.state === "presenting") {
      throw new ContractViolationError("Cannot switch mode while an item is being presented");
    }
    this.mode = mode;
  }

  async advance(): Promise<AdvanceResult> {
    this.assertNotEnded("advance");
    if (this.state === "presenting") {
      throw new ContractViolationError("The current item must be graded before advancing");
    }

    const item = this.queue.shift();
    if (!item) {
      this.state = "exhausted";
      console.info(`Review queue exhausted for user ${this.userId}`);
      return null;
    }

    const mode = this.mode;
    const trainer = createTrainer(mode, item, {
      generator: this.options.generator,
      distractorCount: this.options.distractorCount,
      random: this.options.random,
    });
    this.currentItem = item;
    this.trainer = trainer;
    this.state = "presenting";
    const progress = this.progress();

    try {
      const prompt = await trainer.render();
      if (this.isEnded()) return null;
      console.debug(`Presenting item ${item.id} to user ${this.userId} in ${mode} mode`);
      return { ...prompt, progress };
    } catch (error) {
      if (this.isEnded()) return null;
      // Put the item back so a retry (possibly in another mode) shows it again
      this.queue.unshift(item);
      this.currentItem = null;
      this.trainer = null;
      this.state = "ready";

      const reason: AdvanceFailureReason = error instanceof GenerationUnavailableError ? error.reason : "render_failed";
      console.error(`Failed to render item ${item.id} in ${mode} mode (${reason}):`, error);
      return {
        mode: "error",
        itemId: item.id,
        trainerMode: mode,
        reason,
        error: errorMessage(error),
        progress,
      };
    }
  }

  /**
   * Grade the presented item and schedule its next review. `persist` receives
   * the updated copy before anything in the session changes; if it throws,
   * the item stays presented and the counters are untouched.
   */
  grade(answer: string, persist?: (item: Item) => void): GradeOutcome {
    this.assertNotEnded("grade");
    const item = this.currentItem;
    const trainer = this.trainer;
    if (this.state !== "presenting" || !item || !trainer) {
      throw new ContractViolationError("No item is currently being reviewed");
    }

    const result = trainer.grade(answer);
    const updated = schedule(cloneItem(item), result.rating, this.clock());
    persist?.(cloneItem(updated));

    if (result.isCorrect) {
      this.correct++;
    } else {
      this.incorrect++;
    }
    this.reviewed.push({ item: updated, rating: result.rating });

    this.currentItem = null;
    this.trainer = null;
    this.state = "ready";

    console.info(
      `Graded item ${updated.id} for user ${this.userId}: rating ${result.rating} (${ratingToString(result.rating)}), next in ${updated.interval.toFixed(2)} day(s)`
    );

    return {
      ...result,
      item: cloneItem(updated),
      progress: this.counters(),
    };
  }

  /**
   * Finish the session. Safe to call in any state and more than once; later
   * calls return the first summary. Items still queued keep their metadata.
   */
  end(): SessionSummary {
    if (this.summary) return this.summary;

    const itemsReviewed = this.reviewed.length;
    const durationMs = Math.max(0, this.clock().getTime() - this.startedAt.getTime());

    this.summary = {
      userId: this.userId,
      collectionId: this.collectionId,
      mode: this.mode,
      startedAt: this.startedAt,
      itemsReviewed,
      correct: this.correct,
      incorrect: this.incorrect,
      accuracy: itemsReviewed === 0 ? 0 : this.correct / itemsReviewed,
      durationSeconds: durationMs / 1000,
    };

    const discarded = this.queue.length + (this.currentItem ? 1 : 0);
    this.queue = [];
    this.currentItem = null;
    this.trainer = null;
    this.state = "ended";

    console.info(
      `Ended review session for user ${this.userId}: ${itemsReviewed} reviewed, ${this.correct} correct` +
        (discarded > 0 ? `, ${discarded} left unreviewed` : "")
    );
    return this.summary;
  }

  history(): readonly ReviewedEntry[] {
    return this.reviewed;
  }

  snapshot(): SessionSnapshot {
    return {
      userId: this.userId,
      collectionId: this.collectionId,
      mode: this.mode,
      state: this.state,
      startedAt: this.startedAt,
      currentItemId: this.currentItem?.id ?? null,
      ...this.counters(),
    };
  }

  private counters(): SessionCounters {
    return {
      reviewed: this.reviewed.length,
      correct: this.correct,
      incorrect: this.incorrect,
      remaining: this.queue.length,
    };
  }

  private progress(): Progress {
    const reviewed = this.reviewed.length;
    return { current: reviewed + 1, total: reviewed + 1 + this.queue.length };
  }

  // Re-read after an await: end() may have run while a render was pending
  private isEnded(): boolean {
    return this.state === "ended";
  }

  private assertNotEnded(operation: string): void {
    if (this.isEnded()) {
      throw new ContractViolationError(`Cannot ${operation}: the session has ended`);
    }
  }
}
