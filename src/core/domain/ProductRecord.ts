/**
 * Structured product data extracted from one page
 *
 * Partial records are valid: a missing name or code is undefined, missing
 * attributes or images are empty.
 */
export interface ProductRecord {
  readonly sourceUrl: string;
  readonly name?: string;
  readonly productCode?: string;
  /** Normalized attribute name → value, in order of first appearance */
  readonly attributes: ReadonlyMap<string, string>;
  /** Absolute image URLs, first-seen order, no duplicates */
  readonly images: readonly string[];
  /** Capture time of the product page */
  readonly fetchedAt: string;
}
