import type { Item } from "./scheduler.js";
import { RecallRating, isSuccessfulRecall } from "./recall.js";
import type { SentenceGenerator } from "./generator.js";
import { GenerationUnavailableError, errorMessage } from "./errors.js";
import type { ClozePrompt, GradeResult, Trainer } from "./trainer.js";

export const BLANK_MARKER = "____________";
export const MAX_SENTENCE_LENGTH = 250;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Jaccard similarity over the sets of characters in two strings.
 * Empty input on either side scores 0.
 */
export function characterSimilarity(a: string, b: string): number {
  if (!a || !b) return 0;

  const setA = new Set(Array.from(a));
  const setB = new Set(Array.from(b));

  let intersection = 0;
  for (const ch of setA) {
    if (setB.has(ch)) intersection++;
  }
  const union = setA.size + setB.size - intersection;

  return union > 0 ? intersection / union : 0;
}

// Never 0: even an empty answer rates 1
export function ratingFromSimilarity(similarity: number): RecallRating {
  if (similarity > 0.8) return RecallRating.PerfectRecall;
  if (similarity > 0.6) return RecallRating.CorrectHesitation;
  if (similarity > 0.4) return RecallRating.CorrectDifficult;
  if (similarity > 0.2) return RecallRating.IncorrectFamiliar;
  return RecallRating.IncorrectRecognized;
}

export interface BlankedSentence {
  sentence: string;
  // The term exactly as it appeared in the source sentence
  matchedTerm: string;
}

/**
 * Replace the first case-insensitive occurrence of `term` with the blank marker.
 * Returns null when the term does not occur.
 */
export function blankTerm(sentence: string, term: string): BlankedSentence | null {
  const needle = term.trim();
  if (!needle) return null;

  const match = new RegExp(escapeRegExp(needle), "i").exec(sentence);
  if (!match) return null;

  return {
    sentence: sentence.slice(0, match.index) + BLANK_MARKER + sentence.slice(match.index + match[0].length),
    matchedTerm: match[0],
  };
}

function truncateSentence(sentence: string): string {
  if (sentence.length <= MAX_SENTENCE_LENGTH) return sentence;
  return sentence.slice(0, MAX_SENTENCE_LENGTH) + "...";
}

export class ClozeTrainer implements Trainer {
  readonly mode = "cloze";

  // Expected answer; replaced by the matched casing once a sentence is rendered
  private expectedTerm: string;

  constructor(
    readonly item: Item,
    private readonly generator: SentenceGenerator | null
  ) {
    this.expectedTerm = item.front.trim();
  }

  async render(): Promise<ClozePrompt> {
    if (!this.generator) {
      throw new GenerationUnavailableError("Fill-in-the-blank mode needs a sentence generator, but none is configured");
    }

    let generated: string;
    try {
      generated = await this.generator.generateSentence(this.item.front, this.item.back);
    } catch (error) {
      if (error instanceof GenerationUnavailableError) throw error;
      throw new GenerationUnavailableError(`Sentence generation failed: ${errorMessage(error)}`, "generation_unavailable", {
        cause: error,
      });
    }

    const sentence = truncateSentence(generated.trim());
    const blanked = blankTerm(sentence, this.item.front);
    if (!blanked) {
      console.warn(`Term "${this.item.front}" not found in generated sentence for item ${this.item.id}`);
      throw new GenerationUnavailableError(
        `Generated sentence does not contain the term "${this.item.front.trim()}"`,
        "term_not_found"
      );
    }

    this.expectedTerm = blanked.matchedTerm;
    console.debug(`Cloze sentence for item ${this.item.id}: ${blanked.sentence}`);

    return {
      mode: this.mode,
      itemId: this.item.id,
      front: this.item.front,
      sentence: blanked.sentence,
      prompt: "Fill in the blank with the missing word:",
    };
  }

  grade(answer: string): GradeResult {
    const similarity = characterSimilarity(answer.trim().toLowerCase(), this.expectedTerm.toLowerCase());
    const rating = ratingFromSimilarity(similarity);

    return {
      rating,
      isCorrect: isSuccessfulRecall(rating),
      correctAnswer: this.expectedTerm,
      userAnswer: answer,
      similarity,
    };
  }
}
