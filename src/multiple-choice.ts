import type { Item } from "./scheduler.js";
import { RecallRating, parseInteger } from "./recall.js";
import { ContractViolationError } from "./errors.js";
import type { GradeResult, MultipleChoicePrompt, Trainer } from "./trainer.js";

export const DEFAULT_DISTRACTOR_COUNT = 3;

export interface MultipleChoiceOptions {
  distractorCount?: number;
  random?: () => number;
}

function genericDistractors(front: string): string[] {
  return [
    "None of the above",
    "Not specified on the card",
    `The opposite of ${front}`,
    `A different form of ${front}`,
  ];
}

/**
 * Wrong options for an item: the individual lines of a multi-line back first,
 * then generic templates. Never repeats an option and never includes the
 * correct answer, so the result may be shorter than `count`.
 */
export function buildDistractors(item: Item, count: number): string[] {
  const correct = item.back;
  const distractors: string[] = [];

  const candidates = [
    ...item.back.split("\n").map((part) => part.trim()),
    ...genericDistractors(item.front),
  ];

  for (const candidate of candidates) {
    if (distractors.length >= count) break;
    if (!candidate || candidate === correct || distractors.includes(candidate)) continue;
    distractors.push(candidate);
  }

  return distractors;
}

// Fisher-Yates on a copy
export function shuffle<T>(values: readonly T[], random: () => number = Math.random): T[] {
  const result = [...values];
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
}

export class MultipleChoiceTrainer implements Trainer {
  readonly mode = "multiple_choice";

  private readonly distractorCount: number;
  private readonly random: () => number;
  private correctIndex: number | null = null;

  constructor(readonly item: Item, options: MultipleChoiceOptions = {}) {
    this.distractorCount = options.distractorCount ?? DEFAULT_DISTRACTOR_COUNT;
    this.random = options.random ?? Math.random;
  }

  async render(): Promise<MultipleChoicePrompt> {
    const correct = this.item.back;
    const options = shuffle([correct, ...buildDistractors(this.item, this.distractorCount)], this.random);
    this.correctIndex = options.indexOf(correct);

    return {
      mode: this.mode,
      itemId: this.item.id,
      front: this.item.front,
      options,
      prompt: "Choose the correct answer:",
    };
  }

  grade(answer: string): GradeResult {
    if (this.correctIndex === null) {
      throw new ContractViolationError("Multiple-choice item graded before its options were rendered");
    }

    const selected = parseInteger(answer);
    const isCorrect = selected === this.correctIndex;
    let rating: RecallRating;
    if (selected === null) {
      rating = RecallRating.CompleteBlackout;
    } else if (isCorrect) {
      rating = RecallRating.PerfectRecall;
    } else {
      rating = RecallRating.IncorrectRecognized;
    }

    return {
      rating,
      isCorrect,
      correctAnswer: this.item.back,
      userAnswer: answer,
      correctIndex: this.correctIndex,
    };
  }
}
