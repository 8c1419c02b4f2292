/**
 * Captured content of a loaded page
 *
 * The live page behind it is already closed when a fetcher returns this.
 */
export interface PageSnapshot {
  /** URL the task asked for */
  readonly requestedUrl: string;
  /** URL after redirects; base for relative links */
  readonly finalUrl: string;
  /** Main document HTTP status, null when the browser reported none */
  readonly status: number | null;
  readonly title: string;
  readonly html: string;
  /** ISO timestamp of the capture */
  readonly fetchedAt: string;
}
