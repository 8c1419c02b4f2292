/**
 * Worker pool
 *
 * N async workers share one FIFO queue. Each worker leases one fetcher for
 * its whole lifetime and loops: pop task → fetch → extract → record.
 *
 * - TIMEOUT / BROWSER_CRASHED are retried with a fetcher reset in between
 * - NAVIGATION_FAILED / MALFORMED_PAGE are recorded right away
 * - anything unexpected becomes UNKNOWN_ERROR for that task only
 * - with a specificationPath, the same fetcher also loads {url}/{path}; a
 *   missing characteristics page leaves the product page's attributes
 * - on abort, queued tasks are recorded as CANCELLED at once; tasks still
 *   open after the grace period are recorded as CANCELLED and the
 *   aggregator is sealed
 */

import { logger as rootLogger, Logger } from "@/config/logger";
import type {
  PolitenessConfig,
  RetryConfig,
} from "@/core/domain/PipelineConfig";
import type { RunResult } from "@/core/domain/RunResult";
import type { PageSnapshot } from "@/core/domain/PageSnapshot";
import { ScrapeTask, specificationUrl } from "@/core/domain/ScrapeTask";
import {
  failureOutcome,
  successOutcome,
  TaskOutcome,
} from "@/core/domain/TaskOutcome";
import type {
  IPageFetcher,
  IPageFetcherPool,
} from "@/core/interfaces/IPageFetcher";
import type { IProductExtractor } from "@/extractors/base/IProductExtractor";
import {
  errorMessage,
  ScrapeError,
  ScrapeErrorType,
  toTaskErrorKind,
} from "@/core/interfaces/ScrapeErrorType";
import { createTaskLogger } from "@/utils/LoggerContext";
import { RateLimiter } from "@/utils/RateLimiter";
import { sleep } from "@/utils/sleep";
import {
  AggregatorProgress,
  ResultAggregator,
} from "./ResultAggregator";
import { RetryPolicy } from "./RetryPolicy";
import { WorkQueue } from "./WorkQueue";

export interface WorkerPoolOptions {
  /** Per-fetch timeout */
  fetchTimeoutMs: number;
  retry: RetryConfig;
  politeness: PolitenessConfig;
  /** Wait for in-flight tasks after cancellation */
  cancelGraceMs: number;
  /** Characteristics page segment appended to each product URL */
  specificationPath?: string;
}

export interface WorkerPoolRunOptions {
  concurrency: number;
  signal?: AbortSignal;
  onRecord?: (outcome: TaskOutcome, progress: AggregatorProgress) => void;
}

export class WorkerPool {
  private readonly retryPolicy: RetryPolicy;

  constructor(
    private readonly fetcherPool: IPageFetcherPool,
    private readonly extractor: IProductExtractor,
    private readonly options: WorkerPoolOptions,
    private readonly logger: Logger = rootLogger,
  ) {
    this.retryPolicy = new RetryPolicy(options.retry);
  }

  /**
   * Process every task; resolves once each task has exactly one outcome
   * @throws AggregatorConsistencyError on internal bookkeeping violations
   */
  async run(
    tasks: readonly ScrapeTask[],
    runOptions: WorkerPoolRunOptions,
  ): Promise<RunResult> {
    const aggregator = new ResultAggregator(tasks, {
      onRecord: runOptions.onRecord,
    });
    if (tasks.length === 0) return aggregator.finalize();

    const { signal } = runOptions;
    const queue = new WorkQueue(tasks);
    const workerCount = this.workerCount(runOptions.concurrency, tasks.length);

    this.logger.info(
      {
        tasks: tasks.length,
        workers: workerCount,
        capacity: this.fetcherPool.capacity,
      },
      "Worker pool started",
    );

    const cancelQueued = (): void => {
      const drained = queue.drain();
      for (const task of drained) {
        aggregator.record(
          failureOutcome(
            task,
            ScrapeErrorType.CANCELLED,
            "Cancelled before start",
          ),
        );
      }
      if (drained.length > 0) {
        this.logger.warn(
          { cancelled: drained.length },
          "Queued tasks cancelled",
        );
      }
    };

    // Cancelled before any worker started: no fetcher is leased
    if (signal?.aborted) {
      cancelQueued();
      return aggregator.finalize();
    }
    signal?.addEventListener("abort", cancelQueued, { once: true });

    try {
      const workers = Promise.all(
        Array.from({ length: workerCount }, (_, index) =>
          this.runWorker(index, queue, aggregator, signal),
        ),
      );
      await this.waitForWorkers(workers, aggregator, signal);
    } finally {
      signal?.removeEventListener("abort", cancelQueued);
    }

    // Every worker stopped (no fetcher could be leased) with work left over
    const leftover = queue.drain();
    if (leftover.length > 0) {
      this.logger.error(
        { leftover: leftover.length },
        "No worker left to process queued tasks",
      );
      for (const task of leftover) {
        aggregator.record(
          failureOutcome(
            task,
            ScrapeErrorType.UNKNOWN_ERROR,
            "No browser session available",
          ),
        );
      }
    }

    const result = aggregator.finalize();
    this.logger.info(
      { success: result.successCount, failure: result.failureCount },
      "Worker pool finished",
    );
    return result;
  }

  /**
   * min(concurrency, capacity, tasks), at least 1
   */
  workerCount(concurrency: number, taskCount: number): number {
    return Math.max(
      1,
      Math.min(concurrency, this.fetcherPool.capacity, taskCount),
    );
  }

  /**
   * Resolves when all workers finished, or when the grace period after an
   * abort expired (open tasks are then cancelled and the aggregator sealed).
   */
  private async waitForWorkers(
    workers: Promise<void[]>,
    aggregator: ResultAggregator,
    signal?: AbortSignal,
  ): Promise<void> {
    if (!signal) {
      await workers;
      return;
    }

    const aborted = new Promise<"aborted">((resolve) => {
      if (signal.aborted) resolve("aborted");
      else signal.addEventListener("abort", () => resolve("aborted"), { once: true });
    });
    const first = await Promise.race([
      workers.then(() => "done" as const),
      aborted,
    ]);
    if (first === "done") return;

    const graceTimer = new AbortController();
    const settled = await Promise.race([
      workers.then(() => "done" as const),
      sleep(this.options.cancelGraceMs, graceTimer.signal).then(
        () => "grace-expired" as const,
      ),
    ]);
    graceTimer.abort();
    if (settled === "done") return;

    const open = aggregator.pendingTasks();
    for (const task of open) {
      aggregator.record(
        failureOutcome(
          task,
          ScrapeErrorType.CANCELLED,
          "Cancelled: still running after grace period",
        ),
      );
    }
    aggregator.seal();
    this.logger.warn(
      { open: open.length, grace_ms: this.options.cancelGraceMs },
      "Grace period expired, run sealed",
    );

    // Late worker failures must not surface as unhandled rejections
    workers.catch((error: unknown) => {
      this.logger.error(
        { error: errorMessage(error) },
        "Worker failed after the run was sealed",
      );
    });
  }

  private async runWorker(
    workerId: number,
    queue: WorkQueue,
    aggregator: ResultAggregator,
    signal?: AbortSignal,
  ): Promise<void> {
    const workerLogger = this.logger.child({ worker_id: workerId });

    let fetcher: IPageFetcher;
    try {
      fetcher = await this.fetcherPool.acquire();
    } catch (error) {
      workerLogger.error(
        { error: errorMessage(error) },
        "Worker could not lease a fetcher, stopping",
      );
      return;
    }

    const limiter = new RateLimiter(
      this.options.politeness.minDelayMs,
      this.options.politeness.maxDelayMs,
      workerLogger,
    );

    try {
      while (!signal?.aborted) {
        const task = queue.next();
        if (!task) break;

        if (limiter.enabled) await limiter.throttle(signal, task.url);

        const outcome = signal?.aborted
          ? failureOutcome(task, ScrapeErrorType.CANCELLED, "Cancelled before start")
          : await this.processTask(task, fetcher, workerLogger, signal);

        if (!aggregator.record(outcome)) {
          workerLogger.debug(
            { task_id: task.id },
            "Outcome dropped, run already sealed",
          );
        }
      }
    } finally {
      try {
        await this.fetcherPool.release(fetcher);
      } catch (error) {
        workerLogger.warn(
          { error: errorMessage(error) },
          "Fetcher release failed",
        );
      }
    }
  }

  /**
   * Fetch + extract with retries. Never throws.
   */
  async processTask(
    task: ScrapeTask,
    fetcher: IPageFetcher,
    parentLogger: Logger = this.logger,
    signal?: AbortSignal,
  ): Promise<TaskOutcome> {
    const taskLogger = createTaskLogger(parentLogger, task.id, task.url);
    let attempts = 0;

    try {
      for (;;) {
        attempts++;
        try {
          const snapshot = await fetcher.fetch(task.url, {
            timeoutMs: this.options.fetchTimeoutMs,
            signal,
          });
          const specification = await this.fetchSpecification(
            snapshot,
            fetcher,
            taskLogger,
            signal,
          );
          const record = this.extractor.extract(snapshot, specification);
          taskLogger.debug(
            {
              attempts,
              attributes: record.attributes.size,
              images: record.images.length,
            },
            "Task succeeded",
          );
          return successOutcome(task, record);
        } catch (error) {
          if (signal?.aborted) {
            return failureOutcome(
              task,
              ScrapeErrorType.CANCELLED,
              "Cancelled while in flight",
              attempts,
            );
          }

          if (!this.retryPolicy.shouldRetry(error, attempts)) {
            const kind = toTaskErrorKind(error);
            taskLogger.warn(
              error instanceof ScrapeError
                ? { ...error.toLogObject(), attempts }
                : { error: errorMessage(error), errorType: kind, attempts },
              "Task failed",
            );
            return failureOutcome(task, kind, errorMessage(error), attempts);
          }

          taskLogger.warn(
            {
              attempt: attempts,
              max_attempts: this.retryPolicy.maxAttempts,
              error: errorMessage(error),
            },
            "Retrying after fetcher reset",
          );

          try {
            await fetcher.reset();
          } catch (resetError) {
            return failureOutcome(
              task,
              toTaskErrorKind(error),
              `${errorMessage(error)} (reset failed: ${errorMessage(resetError)})`,
              attempts,
            );
          }
          await sleep(this.retryPolicy.retryDelayMs, signal);
        }
      }
    } catch (error) {
      taskLogger.error(
        { error: errorMessage(error), attempts },
        "Unexpected error while processing task",
      );
      return failureOutcome(
        task,
        ScrapeErrorType.UNKNOWN_ERROR,
        errorMessage(error),
        attempts,
      );
    }
  }

  /**
   * Characteristics page of the product, or undefined when none is
   * configured or the page does not exist (NAVIGATION_FAILED). Other errors
   * fail the attempt like a product page error.
   */
  private async fetchSpecification(
    snapshot: PageSnapshot,
    fetcher: IPageFetcher,
    taskLogger: Logger,
    signal?: AbortSignal,
  ): Promise<PageSnapshot | undefined> {
    const segment = this.options.specificationPath;
    if (!segment) return undefined;

    const url = specificationUrl(snapshot.finalUrl, segment);
    try {
      return await fetcher.fetch(url, {
        timeoutMs: this.options.fetchTimeoutMs,
        signal,
      });
    } catch (error) {
      if (
        error instanceof ScrapeError &&
        error.type === ScrapeErrorType.NAVIGATION_FAILED
      ) {
        taskLogger.warn(
          { specification_url: url, error: error.message },
          "Characteristics page unavailable, keeping product page attributes",
        );
        return undefined;
      }
      throw error;
    }
  }
}
