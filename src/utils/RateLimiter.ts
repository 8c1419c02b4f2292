/**
 * Rate Limiter Utility
 *
 * Keeps a randomized minimum spacing between consecutive calls of one
 * worker. The spacing is drawn from [minDelayMs, maxDelayMs] on each call.
 */

import { logger, Logger } from "@/config/logger";
import { sleep } from "@/utils/sleep";

export class RateLimiter {
  private lastExecutionTime: number = 0;

  constructor(
    private readonly minDelayMs: number,
    private readonly maxDelayMs: number,
    private readonly log: Logger = logger,
    private readonly random: () => number = Math.random,
  ) {}

  /**
   * Delay for the next call, uniformly drawn from the configured range
   */
  nextDelay(): number {
    const span = Math.max(0, this.maxDelayMs - this.minDelayMs);
    return this.minDelayMs + Math.floor(this.random() * (span + 1));
  }

  /**
   * Wait until the drawn delay has passed since the previous call.
   * Returns early when the signal aborts.
   */
  async throttle(signal?: AbortSignal, context?: string): Promise<void> {
    const delay = this.nextDelay();
    const elapsed = Date.now() - this.lastExecutionTime;

    if (elapsed < delay) {
      const waitTime = delay - elapsed;
      this.log.debug({ wait_time_ms: waitTime, context }, "Politeness delay");
      await sleep(waitTime, signal);
    }

    this.lastExecutionTime = Date.now();
  }

  get enabled(): boolean {
    return this.maxDelayMs > 0;
  }
}
