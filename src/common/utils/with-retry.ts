import { RetryStrategy } from '../errors/system-error';

/**
 * Execute an async function with exponential backoff retry.
 * Delays are deterministic: `initialDelayMs × backoffMultiplier^attempt`,
 * capped at `maxDelayMs`. Rethrows the last error once retries run out.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  strategy: RetryStrategy,
  onRetry?: (attempt: number, error: Error) => void,
): Promise<T> {
  let lastError = new Error('withRetry made no attempts');

  for (let attempt = 0; attempt <= strategy.maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (attempt >= strategy.maxRetries) {
        break;
      }

      const baseDelay =
        strategy.initialDelayMs * Math.pow(strategy.backoffMultiplier, attempt);
      const delay = Math.min(baseDelay, strategy.maxDelayMs);

      onRetry?.(attempt + 1, lastError);

      if (delay > 0) {
        await new Promise((resolve) => setTimeout(resolve, delay));
      }
    }
  }

  throw lastError;
}
