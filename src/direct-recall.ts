import type { Item } from "./scheduler.js";
import { RecallRating, isRecallRating, isSuccessfulRecall, parseInteger } from "./recall.js";
import type { DirectRecallPrompt, GradeResult, Trainer } from "./trainer.js";

// Shows the front; the learner's answer *is* their 0-5 self-rating
export class DirectRecallTrainer implements Trainer {
  readonly mode = "direct_recall";

  constructor(readonly item: Item) {}

  async render(): Promise<DirectRecallPrompt> {
    return {
      mode: this.mode,
      itemId: this.item.id,
      front: this.item.front,
      prompt: "Recall the answer to this item:",
    };
  }

  grade(answer: string): GradeResult {
    const parsed = parseInteger(answer);
    // Anything that is not a 0-5 integer counts as a blackout
    const rating = isRecallRating(parsed) ? parsed : RecallRating.CompleteBlackout;

    return {
      rating,
      isCorrect: isSuccessfulRecall(rating),
      correctAnswer: this.item.back,
      userAnswer: answer,
    };
  }
}
