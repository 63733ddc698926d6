/**
 * Retry helper for remote calls
 *
 * Rate-limited, unavailable and network failures are retried with a
 * doubling delay. Anything else is rethrown on the first attempt.
 */

import { isRetryable, toGeminiParserError } from "../errors.js";
import { log } from "./logger.js";

export interface RetryOptions {
  /** Extra attempts after the first one */
  maxRetries: number;
  /** Delay before the first retry; doubled for each further one */
  delayMs: number;
  /** Operation name used in log lines */
  label: string;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export async function withRetry<T>(
  operation: () => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const { maxRetries, delayMs, label } = options;

  for (let attempt = 0; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      const normalized = toGeminiParserError(error);

      if (!isRetryable(normalized) || attempt >= maxRetries) {
        throw normalized;
      }

      const wait = delayMs * 2 ** attempt;
      log.warning(
        `⚠️  ${label} failed (${normalized.code}): ${normalized.message}. Retry ${attempt + 1}/${maxRetries} in ${wait}ms`
      );
      await sleep(wait);
    }
  }
}
