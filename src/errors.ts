/**
 * Raised when a caller breaks an operation's preconditions: grading with
 * nothing presented, a rating outside 0-5, driving an ended session.
 * These are bugs in the caller, not conditions to recover from.
 */
export class ContractViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ContractViolationError";
  }
}

// Why the cloze trainer could not produce a sentence
export type GenerationFailureReason = "generation_unavailable" | "term_not_found";

export class GenerationUnavailableError extends Error {
  readonly reason: GenerationFailureReason;

  constructor(message: string, reason: GenerationFailureReason = "generation_unavailable", options?: { cause?: unknown }) {
    super(message, options);
    this.name = "GenerationUnavailableError";
    this.reason = reason;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
