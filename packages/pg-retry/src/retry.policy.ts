export type RetryOptions = {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
};

export const RETRY_DEFAULTS: RetryOptions = {
  maxAttempts: 5,
  baseDelayMs: 100,
  maxDelayMs: 5000,
};

/**
 * Determines if a failed attempt should be retried, given how many attempts
 * were made and whether the failure was classified as retryable.
 */
export function shouldRetry(
  attempts: number,
  maxAttempts: number,
  retryable: boolean,
): boolean {
  return retryable && attempts < maxAttempts;
}

/**
 * Exponential backoff for the wait after attempt number `attempt` (1-based).
 */
export function retryDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
): number {
  return Math.min(baseDelayMs * 2 ** (attempt - 1), maxDelayMs);
}
