import type { Item } from "./scheduler.js";
import type { RecallRating } from "./recall.js";
import type { SentenceGenerator } from "./generator.js";
import type { TrainerMode } from "./validation.js";
import { DirectRecallTrainer } from "./direct-recall.js";
import { ClozeTrainer } from "./cloze.js";
import { MultipleChoiceTrainer } from "./multiple-choice.js";

export type { TrainerMode } from "./validation.js";

interface BasePrompt {
  itemId: string;
  front: string;
  // Instruction line shown above the item
  prompt: string;
}

export interface DirectRecallPrompt extends BasePrompt {
  mode: "direct_recall";
}

export interface ClozePrompt extends BasePrompt {
  mode: "cloze";
  // Generated sentence with the term replaced by BLANK_MARKER
  sentence: string;
}

export interface MultipleChoicePrompt extends BasePrompt {
  mode: "multiple_choice";
  options: string[];
}

export type TrainerPrompt = DirectRecallPrompt | ClozePrompt | MultipleChoicePrompt;

export interface GradeResult {
  rating: RecallRating;
  isCorrect: boolean;
  correctAnswer: string;
  userAnswer: string;
  // Cloze only: character-set similarity between answer and expected term
  similarity?: number;
  // Multiple choice only
  correctIndex?: number;
}

/**
 * One review mode bound to one item. `render` is always async so callers
 * never branch on the variant; only the cloze trainer actually waits on I/O.
 */
export interface Trainer {
  readonly mode: TrainerMode;
  readonly item: Item;
  render(): Promise<TrainerPrompt>;
  grade(answer: string): GradeResult;
}

export interface TrainerDeps {
  generator?: SentenceGenerator | null;
  distractorCount?: number;
  random?: () => number;
}

export function createTrainer(mode: TrainerMode, item: Item, deps: TrainerDeps = {}): Trainer {
  switch (mode) {
    case "direct_recall":
      return new DirectRecallTrainer(item);
    case "cloze":
      return new ClozeTrainer(item, deps.generator ?? null);
    case "multiple_choice":
      return new MultipleChoiceTrainer(item, {
        distractorCount: deps.distractorCount,
        random: deps.random,
      });
  }
}

const MODE_DESCRIPTIONS: Record<TrainerMode, string> = {
  direct_recall:
    "Direct recall: you see the front of each item and try to remember the back, then rate how well you remembered it from 0 (blackout) to 5 (perfect).",
  cloze:
    "Fill in the blank: each item appears inside a generated sentence with the key term blanked out. Type the missing term; your answer is scored by how close it is.",
  multiple_choice:
    "Multiple choice: pick the correct back of the item from a shuffled list of options. This tests recognition rather than recall.",
};

export function describeMode(mode: TrainerMode): string {
  return MODE_DESCRIPTIONS[mode];
}
