import { ContractViolationError } from "./errors.js";

// 0 = complete blackout ... 5 = perfect recall
export type RecallRating = 0 | 1 | 2 | 3 | 4 | 5;

export const RecallRating = {
  CompleteBlackout: 0,
  IncorrectRecognized: 1,
  IncorrectFamiliar: 2,
  CorrectDifficult: 3,
  CorrectHesitation: 4,
  PerfectRecall: 5,
} as const satisfies Record<string, RecallRating>;

// Ratings at or above this count as a successful recall
export const SUCCESS_THRESHOLD = RecallRating.CorrectDifficult;

export function isRecallRating(value: unknown): value is RecallRating {
  return typeof value === "number" && Number.isInteger(value) && value >= 0 && value <= 5;
}

export function assertRecallRating(value: number): RecallRating {
  if (!isRecallRating(value)) {
    throw new ContractViolationError(`Recall rating must be an integer from 0 to 5, got ${value}`);
  }
  return value;
}

export function isSuccessfulRecall(rating: RecallRating): boolean {
  return rating >= SUCCESS_THRESHOLD;
}

// Parse a free-text integer the way a learner would type it ("3", " 4 ", "+2")
export function parseInteger(raw: string): number | null {
  const trimmed = raw.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) return null;
  const value = Number.parseInt(trimmed, 10);
  return Number.isSafeInteger(value) ? value : null;
}

export function ratingToString(rating: RecallRating): string {
  switch (rating) {
    case 0:
      return "Complete blackout";
    case 1:
      return "Incorrect, recognized when shown";
    case 2:
      return "Incorrect, seemed familiar";
    case 3:
      return "Correct with difficulty";
    case 4:
      return "Correct with hesitation";
    case 5:
      return "Perfect recall";
  }
}
