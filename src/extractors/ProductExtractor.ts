/**
 * ProductExtractor
 *
 * Turns a captured page into a ProductRecord with cheerio. Pure: the same
 * snapshot always yields the same record.
 *
 * Each field is looked up independently; a missing field never aborts the
 * others. Only a page without any content root is malformed.
 */

import { load, type CheerioAPI } from "cheerio";
import type { PageSnapshot } from "@/core/domain/PageSnapshot";
import type {
  AttributeSource,
  ExtractorSelectors,
} from "@/core/domain/PipelineConfig";
import { ExtractorSelectorsSchema } from "@/core/domain/PipelineConfig";
import type { ProductRecord } from "@/core/domain/ProductRecord";
import { ExtractionError } from "@/core/interfaces/ScrapeErrorType";
import type { IProductExtractor } from "./base/IProductExtractor";
import { HtmlHelper, Selection } from "./common/HtmlHelper";

export class ProductExtractor implements IProductExtractor {
  private readonly selectors: ExtractorSelectors;

  constructor(selectors?: ExtractorSelectors) {
    this.selectors = selectors ?? ExtractorSelectorsSchema.parse({});
  }

  extract(snapshot: PageSnapshot, specification?: PageSnapshot): ProductRecord {
    if (!snapshot.html.trim()) {
      throw new ExtractionError("Empty document", {
        url: snapshot.requestedUrl,
      });
    }

    const $ = load(snapshot.html);
    const root = HtmlHelper.firstMatch($, this.selectors.contentRoot);
    if (!root) {
      throw new ExtractionError("No product content root found", {
        url: snapshot.requestedUrl,
      });
    }

    const attributes = this.extractAttributes($, root, this.selectors.attributes);
    // Characteristics page values win over the product page's
    if (specification?.html.trim()) {
      const $details = load(specification.html);
      const detailAttributes = this.extractAttributes(
        $details,
        $details.root().children(),
        this.selectors.specificationAttributes,
      );
      for (const [key, value] of detailAttributes) attributes.set(key, value);
    }

    return {
      sourceUrl: snapshot.requestedUrl,
      name: this.extractName($, root),
      productCode: this.extractProductCode($, root),
      attributes,
      images: this.extractImages($, root, snapshot.finalUrl),
      fetchedAt: snapshot.fetchedAt,
    };
  }

  private extractName($: CheerioAPI, root: Selection): string | undefined {
    return (
      HtmlHelper.firstText($, root, this.selectors.name) ??
      HtmlHelper.metaContent($, "og:title")
    );
  }

  /**
   * Text of the first matching element, or its data-product-code attribute;
   * all whitespace removed
   */
  private extractProductCode(
    $: CheerioAPI,
    root: Selection,
  ): string | undefined {
    for (const selector of this.selectors.productCode) {
      for (const element of root.find(selector).toArray()) {
        const node = $(element);
        const raw = node.text().trim() || node.attr("data-product-code");
        const code = (raw ?? "").replace(/\s+/g, "");
        if (code) return code;
      }
    }
    return undefined;
  }

  /**
   * Later sources overwrite earlier values for the same key; the key keeps
   * the position where it first appeared
   */
  private extractAttributes(
    $: CheerioAPI,
    root: Selection,
    sources: readonly AttributeSource[],
  ): Map<string, string> {
    const attributes = new Map<string, string>();
    for (const source of sources) {
      for (const [key, value] of this.readAttributeSource($, root, source)) {
        attributes.set(key, value);
      }
    }
    return attributes;
  }

  private readAttributeSource(
    $: CheerioAPI,
    root: Selection,
    source: AttributeSource,
  ): Array<[string, string]> {
    const pairs: Array<[string, string]> = [];
    const push = (rawKey: string, rawValue: string): void => {
      const key = HtmlHelper.normalizeKey(rawKey);
      const value = HtmlHelper.normalizeText(rawValue);
      if (key && value) pairs.push([key, value]);
    };

    if (source.type === "rows") {
      for (const row of root.find(source.row).toArray()) {
        const node = $(row);
        push(
          node.find(source.name).first().text(),
          node.find(source.value).first().text(),
        );
      }
      return pairs;
    }

    // definition-list: each <dt> pairs with the <dd> that follows it
    for (const list of root.find(source.list).toArray()) {
      let pendingKey: string | undefined;
      for (const child of $(list).children().toArray()) {
        if (child.name === "dt") {
          pendingKey = $(child).text();
        } else if (child.name === "dd" && pendingKey !== undefined) {
          push(pendingKey, $(child).text());
          pendingKey = undefined;
        }
      }
    }
    return pairs;
  }

  private extractImages(
    $: CheerioAPI,
    root: Selection,
    baseUrl: string,
  ): string[] {
    const scope = HtmlHelper.firstMatch($, this.selectors.gallery) ?? root;
    const images: string[] = [];
    const seen = new Set<string>();

    for (const element of scope.find("img").toArray()) {
      const node = $(element);
      let resolved: string | undefined;
      for (const attribute of this.selectors.imageAttributes) {
        resolved = HtmlHelper.resolveUrl(node.attr(attribute), baseUrl);
        if (resolved) break;
      }
      resolved ??= HtmlHelper.resolveUrl(
        HtmlHelper.firstSrcsetCandidate(node.attr("srcset")),
        baseUrl,
      );

      if (resolved && !seen.has(resolved)) {
        seen.add(resolved);
        images.push(resolved);
      }
    }

    if (images.length === 0) {
      const ogImage = HtmlHelper.resolveUrl(
        HtmlHelper.metaContent($, "og:image"),
        baseUrl,
      );
      if (ogImage) images.push(ogImage);
    }

    return images;
  }
}
