/**
 * Browser session pool
 *
 * Object pool of PlaywrightPageFetchers, one browser each.
 *
 * - all sessions are launched up front by initialize()
 * - acquire/release lease a session exclusively (async-mutex, FIFO)
 * - a disconnected session is relaunched when it is next acquired
 */

import { Mutex } from "async-mutex";
import type { Browser } from "playwright-core";
import { resolveLaunchArgs } from "@/config/BrowserArgs";
import { logger as rootLogger, Logger } from "@/config/logger";
import type { BrowserConfig } from "@/core/domain/PipelineConfig";
import type {
  IPageFetcher,
  IPageFetcherPool,
} from "@/core/interfaces/IPageFetcher";
import {
  errorMessage,
  PipelineStartupError,
} from "@/core/interfaces/ScrapeErrorType";
import { PlaywrightPageFetcher } from "../PlaywrightPageFetcher";
import { BrowserLauncher, launchStealthChromium } from "./BrowserLauncher";

export interface BrowserSessionPoolOptions {
  /** Number of browser sessions */
  sessions: number;
  browser: BrowserConfig;
  launcher?: BrowserLauncher;
}

interface PooledSession {
  fetcher: PlaywrightPageFetcher;
  inUse: boolean;
  createdAt: number;
}

export class BrowserSessionPool implements IPageFetcherPool {
  private pool: PooledSession[] = [];
  private initialized = false;
  private readonly mutex = new Mutex();
  private readonly launcher: BrowserLauncher;

  constructor(
    private readonly options: BrowserSessionPoolOptions,
    private readonly logger: Logger = rootLogger,
  ) {
    this.launcher = options.launcher ?? launchStealthChromium;
  }

  get capacity(): number {
    return this.pool.length;
  }

  /**
   * Launch every session in parallel. Partial success is kept.
   * @throws PipelineStartupError when not a single session launched
   */
  async initialize(): Promise<void> {
    if (this.initialized) {
      this.logger.debug(
        { poolSize: this.pool.length },
        "BrowserSessionPool already initialized",
      );
      return;
    }

    const requested = this.options.sessions;
    this.logger.info({ sessions: requested }, "Launching browser sessions");
    const startTime = Date.now();

    const results = await Promise.allSettled(
      Array.from({ length: requested }, () => this.launchBrowser()),
    );

    const failures: unknown[] = [];
    for (const result of results) {
      if (result.status === "fulfilled") {
        const id = this.pool.length;
        this.pool.push({
          fetcher: new PlaywrightPageFetcher(
            id,
            result.value,
            () => this.launchBrowser(),
            this.options.browser,
            this.logger,
          ),
          inUse: false,
          createdAt: Date.now(),
        });
      } else {
        failures.push(result.reason);
        this.logger.error(
          { error: errorMessage(result.reason) },
          "Browser launch failed",
        );
      }
    }

    if (this.pool.length === 0) {
      throw new PipelineStartupError(
        `No browser session could be launched (${requested} attempted): ${errorMessage(failures[0])}`,
        failures[0],
      );
    }
    if (failures.length > 0) {
      this.logger.warn(
        { requested, launched: this.pool.length },
        "Running with fewer browser sessions than requested",
      );
    }

    this.initialized = true;
    this.logger.info(
      { poolSize: this.pool.length, elapsedMs: Date.now() - startTime },
      "BrowserSessionPool ready",
    );
  }

  async acquire(): Promise<IPageFetcher> {
    if (!this.initialized) {
      throw new Error("BrowserSessionPool is not initialized; call initialize()");
    }

    const release = await this.mutex.acquire();
    try {
      const available = this.pool.find((p) => !p.inUse);
      if (!available) {
        throw new Error(
          `No browser session available (pool size: ${this.pool.length})`,
        );
      }

      if (!available.fetcher.isConnected) {
        this.logger.warn(
          { fetcher_id: available.fetcher.id, createdAt: available.createdAt },
          "Browser disconnected, relaunching",
        );
        await available.fetcher.reset();
        available.createdAt = Date.now();
      }

      available.inUse = true;
      this.logger.debug(
        { fetcher_id: available.fetcher.id, ...this.getStatus() },
        "Browser session leased",
      );
      return available.fetcher;
    } finally {
      release();
    }
  }

  async release(fetcher: IPageFetcher): Promise<void> {
    const pooled = this.pool.find((p) => p.fetcher === fetcher);
    if (!pooled) {
      this.logger.warn(
        { fetcher_id: fetcher.id },
        "Release of a fetcher not owned by this pool ignored",
      );
      return;
    }
    pooled.inUse = false;
  }

  async shutdown(): Promise<void> {
    this.logger.info({ poolSize: this.pool.length }, "Closing browser sessions");
    await Promise.all(this.pool.map((p) => p.fetcher.close()));
    this.pool = [];
    this.initialized = false;
  }

  getStatus(): { poolSize: number; available: number; inUse: number } {
    const inUse = this.pool.filter((p) => p.inUse).length;
    return {
      poolSize: this.pool.length,
      available: this.pool.length - inUse,
      inUse,
    };
  }

  private launchBrowser(): Promise<Browser> {
    return this.launcher({
      headless: this.options.browser.headless,
      args: resolveLaunchArgs(this.options.browser),
    });
  }
}
