/**
 * PlaywrightPageFetcher
 *
 * Owns one browser session. Every fetch opens a fresh context + page with
 * the next user agent of the rotation, captures the rendered HTML and closes
 * both before returning or throwing.
 *
 * Error mapping:
 * - TIMEOUT: Playwright TimeoutError, net::ERR_TIMED_OUT, supervising timer
 * - NAVIGATION_FAILED: HTTP status >= 400, other net::ERR_*, not-found /
 *   access-denied page titles
 * - BROWSER_CRASHED: closed target, disconnected browser, page crash
 */

import { errors } from "playwright-core";
import type { Browser, BrowserContext, Page } from "playwright-core";
import { logger as rootLogger, Logger } from "@/config/logger";
import { BLOCKED_TITLE_MARKERS } from "@/config/constants";
import type { BrowserConfig } from "@/core/domain/PipelineConfig";
import type { PageSnapshot } from "@/core/domain/PageSnapshot";
import type {
  FetchOptions,
  IPageFetcher,
} from "@/core/interfaces/IPageFetcher";
import {
  CancelledError,
  errorMessage,
  FetchError,
  ScrapeError,
  ScrapeErrorType,
} from "@/core/interfaces/ScrapeErrorType";
import { getTimestampWithTimezone } from "@/utils/timestamp";
import { FetchSupervisor } from "./base/FetchSupervisor";

export type PageFetcherOptions = Pick<
  BrowserConfig,
  "waitUntil" | "settleDelayMs" | "userAgents" | "locale" | "viewport"
>;

const CRASH_PATTERN =
  /target (page, context or browser )?(has been )?closed|browser has been closed|browser has disconnected|page crashed|crash/i;

/**
 * Title of a not-found or access-denied page
 */
export function isBlockedTitle(title: string): boolean {
  const normalized = title.toLowerCase();
  return BLOCKED_TITLE_MARKERS.some((marker) => normalized.includes(marker));
}

export class PlaywrightPageFetcher implements IPageFetcher {
  private fetchCount = 0;

  constructor(
    public readonly id: number,
    private browser: Browser,
    private readonly relaunch: () => Promise<Browser>,
    private readonly options: PageFetcherOptions,
    private readonly logger: Logger = rootLogger,
  ) {}

  get isConnected(): boolean {
    return this.browser.isConnected();
  }

  async fetch(url: string, options: FetchOptions): Promise<PageSnapshot> {
    if (options.signal?.aborted) {
      throw new CancelledError("Cancelled before navigation", { url });
    }
    if (!this.browser.isConnected()) {
      throw new FetchError(
        ScrapeErrorType.BROWSER_CRASHED,
        "Browser session is disconnected",
        { url },
      );
    }

    const userAgent = this.nextUserAgent();
    const supervisor = new FetchSupervisor(url, options.timeoutMs, options.signal);
    let pendingContext: Promise<BrowserContext> | undefined;
    let context: BrowserContext | undefined;
    let page: Page | undefined;

    try {
      pendingContext = this.browser.newContext({
        userAgent,
        locale: this.options.locale,
        viewport: this.options.viewport,
      });
      context = await supervisor.guard(pendingContext);
      page = await supervisor.guard(context.newPage());
      page.once("crash", () => {
        supervisor.fail(
          new FetchError(ScrapeErrorType.BROWSER_CRASHED, "Page crashed", {
            url,
          }),
        );
      });

      const response = await supervisor.guard(
        page.goto(url, {
          timeout: options.timeoutMs,
          waitUntil: this.options.waitUntil,
        }),
      );
      const status = response ? response.status() : null;
      if (status !== null && status >= 400) {
        throw new FetchError(
          ScrapeErrorType.NAVIGATION_FAILED,
          `HTTP ${status}`,
          { url },
        );
      }

      if (this.options.settleDelayMs > 0) {
        await supervisor.guard(page.waitForTimeout(this.options.settleDelayMs));
      }

      const title = await supervisor.guard(page.title());
      if (isBlockedTitle(title)) {
        throw new FetchError(
          ScrapeErrorType.NAVIGATION_FAILED,
          `Not-found or access-denied page: "${title}"`,
          { url },
        );
      }

      const html = await supervisor.guard(page.content());
      const snapshot: PageSnapshot = {
        requestedUrl: url,
        finalUrl: page.url(),
        status,
        title,
        html,
        fetchedAt: getTimestampWithTimezone(),
      };

      this.logger.debug(
        {
          fetcher_id: this.id,
          url,
          status,
          final_url: snapshot.finalUrl,
          html_length: html.length,
        },
        "Page captured",
      );
      return snapshot;
    } catch (error) {
      throw this.classify(error, url, supervisor);
    } finally {
      supervisor.dispose();
      if (!context && pendingContext) this.discardLateContext(pendingContext);
      await this.closeQuietly(page, context);
    }
  }

  /**
   * Close the current browser and launch a fresh one
   */
  async reset(): Promise<void> {
    this.logger.info({ fetcher_id: this.id }, "Resetting browser session");
    await this.close();
    this.browser = await this.relaunch();
  }

  async close(): Promise<void> {
    if (!this.browser.isConnected()) return;
    try {
      await this.browser.close();
    } catch (error) {
      this.logger.warn(
        { fetcher_id: this.id, error: errorMessage(error) },
        "Browser close failed",
      );
    }
  }

  private nextUserAgent(): string {
    const agents = this.options.userAgents;
    const agent = agents[this.fetchCount % agents.length];
    this.fetchCount++;
    return agent;
  }

  /**
   * Map a thrown value to the fetch error taxonomy. Values that match no
   * known failure are returned unchanged.
   */
  private classify(
    error: unknown,
    url: string,
    supervisor: FetchSupervisor,
  ): unknown {
    if (error instanceof ScrapeError) return error;
    if (supervisor.failure) return supervisor.failure;

    const message = errorMessage(error);
    const options = { url, cause: error };

    if (error instanceof errors.TimeoutError || message.includes("net::ERR_TIMED_OUT")) {
      return new FetchError(ScrapeErrorType.TIMEOUT, message, options);
    }
    if (/net::ERR_|NS_ERROR_/.test(message)) {
      return new FetchError(ScrapeErrorType.NAVIGATION_FAILED, message, options);
    }
    if (CRASH_PATTERN.test(message) || !this.browser.isConnected()) {
      return new FetchError(ScrapeErrorType.BROWSER_CRASHED, message, options);
    }
    return error;
  }

  /**
   * A context that finished opening after the fetch was stopped
   */
  private discardLateContext(pending: Promise<BrowserContext>): void {
    void pending
      .then((late) => late.close())
      .catch((error: unknown) => {
        this.logger.debug(
          { fetcher_id: this.id, error: errorMessage(error) },
          "Late context cleanup failed",
        );
      });
  }

  private async closeQuietly(
    page: Page | undefined,
    context: BrowserContext | undefined,
  ): Promise<void> {
    for (const target of [page, context]) {
      if (!target) continue;
      try {
        await target.close();
      } catch (error) {
        this.logger.debug(
          { fetcher_id: this.id, error: errorMessage(error) },
          "Page cleanup failed",
        );
      }
    }
  }
}
