/**
 * Product extractor interface
 */

import type { PageSnapshot } from "@/core/domain/PageSnapshot";
import type { ProductRecord } from "@/core/domain/ProductRecord";

export interface IProductExtractor {
  /**
   * Pure and deterministic over its snapshots. Attributes found on the
   * optional characteristics page are merged after the product page's own.
   * @throws ExtractionError (MALFORMED_PAGE) when the page has no content root
   */
  extract(snapshot: PageSnapshot, specification?: PageSnapshot): ProductRecord;
}
