import { HttpError } from '../../types.js';
import type { RetryPolicy } from '../../types.js';
import type { Logger } from '../../logger.js';

export function isRetryable(status: number): boolean {
  return status === 429 || status >= 500 || status === 0;
}

export function parseRetryAfter(headers: Pick<Headers, 'get'>): number | null {
  const raw = headers.get('retry-after');
  if (raw === null) return null;

  // Delta seconds (e.g. "5")
  const seconds = Number(raw);
  if (Number.isFinite(seconds)) {
    return seconds > 0 ? seconds * 1000 : null;
  }

  // HTTP-date (e.g. "Thu, 01 Dec 2025 16:00:00 GMT")
  const date = Date.parse(raw);
  if (Number.isFinite(date)) {
    const delayMs = date - Date.now();
    return delayMs > 0 ? delayMs : null;
  }

  return null;
}

export function backoffDelayMs(err: HttpError, attempt: number, policy: RetryPolicy): number {
  if (err.status === 429 && err.retryAfterMs !== null) {
    return Math.min(err.retryAfterMs, policy.retryMaxMs);
  }
  const base = policy.retryBaseMs * Math.pow(2, attempt - 1);
  const jitter = Math.random() * base * 0.3;
  return Math.min(base + jitter, policy.retryMaxMs);
}

/**
 * Wraps `fn` so retryable HttpErrors are attempted up to `policy.maxRetries`
 * times in total. Anything else, or the last failure, is rethrown.
 */
export function withRetry<T>(
  fn: () => Promise<T>,
  policy: RetryPolicy,
  logger: Logger,
  operationName: string,
): () => Promise<T> {
  return async (): Promise<T> => {
    let lastError: HttpError | null = null;

    for (let attempt = 1; attempt <= policy.maxRetries; attempt++) {
      try {
        return await fn();
      } catch (err) {
        if (!(err instanceof HttpError) || !isRetryable(err.status)) {
          throw err;
        }

        lastError = err;
        if (attempt === policy.maxRetries) break;

        const delayMs = backoffDelayMs(err, attempt, policy);
        logger.debug(
          { operationName, attempt, maxRetries: policy.maxRetries, status: err.status, delayMs },
          'Retrying operation',
        );

        await sleep(delayMs);
      }
    }

    throw lastError ?? new HttpError('Max retries exceeded', 0, 'UNKNOWN', '');
  };
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
