/**
 * Pipeline Controller
 *
 * Runs one scrape job end to end:
 * 1. start the global deadline, apply the URL limit
 * 2. pre-flight checks (output path, browser sessions); fatal before any task
 * 3. worker pool
 * 4. fetcher pool shutdown
 * 5. sink (JSON file, then API) and run summary
 *
 * The deadline also covers browser start-up: a launch that outlasts it ends
 * in an all-CANCELLED result, and the pool is shut down once the launch
 * settles.
 *
 * Only one run at a time; stop() aborts it through the same path as the
 * deadline.
 */

import { constants as fsConstants } from "fs";
import * as fs from "fs/promises";
import * as path from "path";
import { v4 as uuidv4 } from "uuid";
import { logger as rootLogger, Logger } from "@/config/logger";
import type { PipelineConfig } from "@/core/domain/PipelineConfig";
import type { RunResult } from "@/core/domain/RunResult";
import type { RunSummary } from "@/core/domain/RunSummary";
import { createTasks, ScrapeTask } from "@/core/domain/ScrapeTask";
import type { IPageFetcherPool } from "@/core/interfaces/IPageFetcher";
import {
  CancelledError,
  errorMessage,
  PipelineBusyError,
  PipelineStartupError,
  TaskErrorKind,
} from "@/core/interfaces/ScrapeErrorType";
import type { IProductExtractor } from "@/extractors/base/IProductExtractor";
import { ProductExtractor } from "@/extractors/ProductExtractor";
import { BrowserSessionPool } from "@/fetchers/base/BrowserSessionPool";
import { WorkerPool } from "@/pipeline/WorkerPool";
import { ResultSink } from "@/sink/ResultSink";
import { createRunLogger, logImportant } from "@/utils/LoggerContext";
import { getTimestampWithTimezone } from "@/utils/timestamp";
import { RunStatus, RunStatusTracker } from "./RunStatusTracker";

export interface PipelineControllerDeps {
  createFetcherPool?: (config: PipelineConfig, logger: Logger) => IPageFetcherPool;
  extractor?: IProductExtractor;
  sink?: ResultSink;
  tracker?: RunStatusTracker;
  logger?: Logger;
}

function defaultFetcherPool(
  config: PipelineConfig,
  logger: Logger,
): IPageFetcherPool {
  return new BrowserSessionPool(
    {
      sessions: config.browser.sessions ?? config.concurrency,
      browser: config.browser,
    },
    logger,
  );
}

export class PipelineController {
  private activeRun: AbortController | null = null;
  private readonly createFetcherPool: (
    config: PipelineConfig,
    logger: Logger,
  ) => IPageFetcherPool;
  private readonly extractor: IProductExtractor;
  private readonly sink: ResultSink;
  private readonly tracker: RunStatusTracker;
  private readonly logger: Logger;

  constructor(
    private readonly config: PipelineConfig,
    deps: PipelineControllerDeps = {},
  ) {
    this.logger = deps.logger ?? rootLogger;
    this.createFetcherPool = deps.createFetcherPool ?? defaultFetcherPool;
    this.extractor = deps.extractor ?? new ProductExtractor(config.extractor);
    this.sink = deps.sink ?? new ResultSink(this.logger);
    this.tracker =
      deps.tracker ??
      new RunStatusTracker({ statusPath: config.output.statusPath }, this.logger);
  }

  get isRunning(): boolean {
    return this.activeRun !== null;
  }

  getStatus(): RunStatus {
    return this.tracker.getStatus();
  }

  /**
   * Abort the active run
   * @returns false when no run is active
   */
  stop(reason = "Stopped by request"): boolean {
    if (!this.activeRun) return false;
    this.logger.warn({ reason }, "Stopping run");
    this.activeRun.abort(new CancelledError(reason));
    return true;
  }

  /**
   * @throws PipelineBusyError when a run is already active
   * @throws PipelineStartupError when a pre-flight check fails
   */
  async run(urls: readonly string[]): Promise<RunSummary> {
    if (this.activeRun) throw new PipelineBusyError();

    const abort = new AbortController();
    this.activeRun = abort;
    const runId = uuidv4();
    const runLogger = createRunLogger(runId, this.logger);
    const startTime = Date.now();
    const startedAt = getTimestampWithTimezone();
    const deadline = this.startDeadline(abort, runLogger);

    try {
      const selected =
        this.config.limit > 0 ? urls.slice(0, this.config.limit) : [...urls];
      if (selected.length < urls.length) {
        runLogger.info(
          { input: urls.length, limit: this.config.limit },
          "URL list truncated by limit",
        );
      }

      await this.checkOutputPath(this.config.output.path);
      const tasks = createTasks(selected);

      this.tracker.start(runId, tasks.length);
      logImportant(runLogger, "Run started", {
        total: tasks.length,
        concurrency: this.config.concurrency,
      });

      const result = await this.execute(tasks, abort, runLogger);
      clearTimeout(deadline);
      const cancelled = abort.signal.aborted;

      const sink = await this.sink.emit(result, {
        outputPath: this.config.output.path,
        api: this.config.api,
      });

      const finishedAt = getTimestampWithTimezone();
      const summary: RunSummary = {
        runId,
        total: tasks.length,
        successCount: result.successCount,
        failureCount: result.failureCount,
        failuresByKind: this.countFailures(result),
        cancelled,
        startedAt,
        finishedAt,
        durationMs: Date.now() - startTime,
        sink,
      };

      this.tracker.finish(cancelled ? "stopped" : "completed");
      logImportant(runLogger, "Run finished", {
        total: summary.total,
        success: summary.successCount,
        failure: summary.failureCount,
        failures_by_kind: summary.failuresByKind,
        cancelled,
        json_written: sink.jsonWritten,
        api_accepted: sink.apiAccepted,
        duration_ms: summary.durationMs,
      });
      return summary;
    } catch (error) {
      this.tracker.finish("failed", error);
      runLogger.error({ error: errorMessage(error) }, "Run failed");
      throw error;
    } finally {
      clearTimeout(deadline);
      this.activeRun = null;
      await this.tracker.flush();
    }
  }

  private startDeadline(
    abort: AbortController,
    runLogger: Logger,
  ): NodeJS.Timeout | undefined {
    const deadlineMs = this.config.runDeadlineMs;
    if (deadlineMs === undefined) return undefined;
    return setTimeout(() => {
      runLogger.warn({ deadline_ms: deadlineMs }, "Run deadline expired");
      abort.abort(new CancelledError("Run deadline exceeded"));
    }, deadlineMs);
  }

  /**
   * Launch the fetcher pool, run the workers and always shut the pool down
   */
  private async execute(
    tasks: readonly ScrapeTask[],
    abort: AbortController,
    runLogger: Logger,
  ): Promise<RunResult> {
    const fetcherPool = this.createFetcherPool(this.config, runLogger);
    // Set while a launch is still running after the run was cancelled
    let pendingLaunch: Promise<unknown> | undefined;

    try {
      // An empty run needs no browser
      if (tasks.length > 0 && !abort.signal.aborted) {
        const launch = fetcherPool.initialize().then(
          () => ({ ok: true as const }),
          (error: unknown) => ({ ok: false as const, error }),
        );
        const started = await Promise.race([
          launch,
          abortedPromise(abort.signal),
        ]);

        if (started === "aborted") {
          runLogger.warn("Run cancelled while browser sessions were starting");
          pendingLaunch = launch;
        } else if (!started.ok) {
          throw started.error instanceof PipelineStartupError
            ? started.error
            : new PipelineStartupError(
                `Fetcher pool initialization failed: ${errorMessage(started.error)}`,
                started.error,
              );
        }
      }

      const workerPool = new WorkerPool(
        fetcherPool,
        this.extractor,
        {
          fetchTimeoutMs: this.config.browser.navigationTimeoutMs,
          retry: this.config.retry,
          politeness: this.config.politeness,
          cancelGraceMs: this.config.cancelGraceMs,
          specificationPath: this.config.extractor.specificationPath,
        },
        runLogger,
      );

      return await workerPool.run(tasks, {
        concurrency: this.config.concurrency,
        signal: abort.signal,
        onRecord: (outcome) => this.tracker.recordOutcome(outcome),
      });
    } finally {
      if (pendingLaunch) {
        void pendingLaunch.then(() => this.shutdownPool(fetcherPool, runLogger));
      } else {
        await this.shutdownPool(fetcherPool, runLogger);
      }
    }
  }

  /**
   * Never rejects
   */
  private async shutdownPool(
    fetcherPool: IPageFetcherPool,
    runLogger: Logger,
  ): Promise<void> {
    try {
      await fetcherPool.shutdown();
    } catch (error) {
      runLogger.warn(
        { error: errorMessage(error) },
        "Fetcher pool shutdown failed",
      );
    }
  }

  /**
   * Output directory must be creatable and writable, and the target must
   * not be a directory
   */
  private async checkOutputPath(outputPath: string): Promise<void> {
    const target = path.resolve(outputPath);
    const dir = path.dirname(target);

    try {
      await fs.mkdir(dir, { recursive: true });
      await fs.access(dir, fsConstants.W_OK);
    } catch (error) {
      throw new PipelineStartupError(
        `Output directory is not writable: ${dir} (${errorMessage(error)})`,
        error,
      );
    }

    const existing = await fs
      .stat(target)
      .catch((error: NodeJS.ErrnoException) => {
        if (error.code === "ENOENT") return null;
        throw new PipelineStartupError(
          `Output path is not accessible: ${target} (${error.message})`,
          error,
        );
      });
    if (existing?.isDirectory()) {
      throw new PipelineStartupError(`Output path is a directory: ${target}`);
    }
  }

  private countFailures(result: RunResult): Partial<Record<TaskErrorKind, number>> {
    const counts: Partial<Record<TaskErrorKind, number>> = {};
    for (const outcome of result.outcomes) {
      if (outcome.kind === "failure") {
        counts[outcome.error] = (counts[outcome.error] ?? 0) + 1;
      }
    }
    return counts;
  }
}

function abortedPromise(signal: AbortSignal): Promise<"aborted"> {
  return new Promise((resolve) => {
    if (signal.aborted) resolve("aborted");
    else signal.addEventListener("abort", () => resolve("aborted"), { once: true });
  });
}
