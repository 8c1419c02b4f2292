/**
 * Page fetcher interfaces
 *
 * A fetcher owns one browser session and is leased to one worker at a time.
 */

import type { PageSnapshot } from "@/core/domain/PageSnapshot";

export interface FetchOptions {
  /** Per-fetch timeout (navigation + capture) */
  timeoutMs: number;
  /** Aborting cancels the in-flight navigation */
  signal?: AbortSignal;
}

/**
 * Loads one URL and captures its rendered content
 */
export interface IPageFetcher {
  readonly id: number;

  /**
   * @throws FetchError (TIMEOUT / NAVIGATION_FAILED / BROWSER_CRASHED)
   * @throws CancelledError when options.signal aborts
   */
  fetch(url: string, options: FetchOptions): Promise<PageSnapshot>;

  /**
   * Replace the underlying browser session with a fresh one
   */
  reset(): Promise<void>;
}

/**
 * Fixed set of fetchers, leased exclusively
 */
export interface IPageFetcherPool {
  /** Number of usable sessions (0 before initialize) */
  readonly capacity: number;

  /**
   * Launch the sessions
   * @throws PipelineStartupError when no session could be launched
   */
  initialize(): Promise<void>;

  /**
   * @throws Error when the pool is not initialized or exhausted
   */
  acquire(): Promise<IPageFetcher>;

  release(fetcher: IPageFetcher): Promise<void>;

  shutdown(): Promise<void>;
}
