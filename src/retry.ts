export interface RetryOptions {
  // Attempts after the first one
  maxRetries?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
}

// Wait before retry number `attempt` (0-based): base, 2x base, 4x base... capped
export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  return Math.min(baseDelayMs * 2 ** attempt, maxDelayMs);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Call `fn` until it resolves or the retries run out, backing off
 * exponentially between attempts. Rejects with the last error.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const { maxRetries = 3, baseDelayMs = 1000, maxDelayMs = 10000 } = options;
  const attempts = maxRetries + 1;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt + 1 >= attempts) throw error;

      const delay = backoffDelay(attempt, baseDelayMs, maxDelayMs);
      console.warn(`Attempt ${attempt + 1}/${attempts} failed, retrying in ${delay}ms:`, error instanceof Error ? error.message : error);
      await sleep(delay);
    }
  }
}
