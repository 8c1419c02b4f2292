/**
 * Supervises one fetch: a timer and the caller's abort signal race every
 * browser call made through guard().
 */

import {
  CancelledError,
  FetchError,
  ScrapeError,
  ScrapeErrorType,
} from "@/core/interfaces/ScrapeErrorType";

export class FetchSupervisor {
  private readonly stopped: Promise<never>;
  private rejectStopped: (error: ScrapeError) => void = () => undefined;
  private readonly timer: NodeJS.Timeout;
  private failureReason: ScrapeError | undefined;

  constructor(
    private readonly url: string,
    timeoutMs: number,
    private readonly signal?: AbortSignal,
  ) {
    this.stopped = new Promise<never>((_, reject) => {
      this.rejectStopped = reject;
    });
    // Observed through guard(); this only marks the promise as handled
    this.stopped.catch(() => undefined);

    this.timer = setTimeout(() => {
      this.fail(
        new FetchError(
          ScrapeErrorType.TIMEOUT,
          `Page load exceeded ${timeoutMs}ms`,
          { url },
        ),
      );
    }, timeoutMs);
    signal?.addEventListener("abort", this.onAbort, { once: true });
  }

  private readonly onAbort = (): void => {
    this.fail(new CancelledError("Cancelled while in flight", { url: this.url }));
  };

  /**
   * Stop the fetch with the given error (first call wins)
   */
  fail(error: ScrapeError): void {
    if (this.failureReason) return;
    this.failureReason = error;
    this.rejectStopped(error);
  }

  /**
   * Settles with the operation, or rejects as soon as the fetch is stopped
   */
  guard<T>(operation: Promise<T>): Promise<T> {
    return Promise.race([operation, this.stopped]);
  }

  get failure(): ScrapeError | undefined {
    return this.failureReason;
  }

  dispose(): void {
    clearTimeout(this.timer);
    this.signal?.removeEventListener("abort", this.onAbort);
  }
}
