/**
 * Fetch retry policy
 *
 * Retries only errors flagged retryable (TIMEOUT, BROWSER_CRASHED), up to
 * maxRetries extra attempts.
 */

import type { RetryConfig } from "@/core/domain/PipelineConfig";
import { ScrapeError } from "@/core/interfaces/ScrapeErrorType";

export class RetryPolicy {
  constructor(private readonly config: RetryConfig) {}

  /**
   * @param attempt - 1-based number of the attempt that just failed
   */
  shouldRetry(error: unknown, attempt: number): boolean {
    return (
      error instanceof ScrapeError &&
      error.retryable &&
      attempt <= this.config.maxRetries
    );
  }

  get maxAttempts(): number {
    return this.config.maxRetries + 1;
  }

  get retryDelayMs(): number {
    return this.config.retryDelayMs;
  }
}
