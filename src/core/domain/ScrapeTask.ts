/**
 * One unit of work: a single input URL
 */
export interface ScrapeTask {
  /** Position of the URL in the input list (0-based) */
  readonly id: number;
  readonly url: string;
}

/**
 * Builds immutable tasks in input order
 */
export function createTasks(urls: readonly string[]): ScrapeTask[] {
  return urls.map((url, id) => Object.freeze({ id, url }));
}

/**
 * URL of a product's characteristics page: the path segment appended to the
 * product URL's path, query and fragment dropped
 *
 * specificationUrl("https://shop.test/p/1/?x=1", "specification")
 *   → "https://shop.test/p/1/specification"
 */
export function specificationUrl(productUrl: string, segment: string): string {
  const url = new URL(productUrl);
  const base = url.pathname.replace(/\/+$/, "");
  const tail = segment.replace(/^\/+|\/+$/g, "");
  url.pathname = `${base}/${tail}`;
  url.search = "";
  url.hash = "";
  return url.toString();
}
