/**
 * HtmlHelper Utility
 *
 * Static helpers over a cheerio document. Every lookup returns undefined
 * (or an empty list) instead of throwing when nothing matches.
 */

import type { Cheerio, CheerioAPI } from "cheerio";
import type { Element } from "domhandler";

export type Selection = Cheerio<Element>;

export class HtmlHelper {
  /**
   * Trim and collapse inner whitespace (including &nbsp;)
   */
  static normalizeText(value: string | undefined | null): string {
    return (value ?? "").replace(/\s+/g, " ").trim();
  }

  /**
   * Attribute key: normalized, trailing ":" removed, lower-cased
   */
  static normalizeKey(value: string | undefined | null): string {
    return HtmlHelper.normalizeText(value).replace(/\s*:$/, "").toLowerCase();
  }

  /**
   * First element matching any selector, tried in order
   */
  static firstMatch(
    $: CheerioAPI,
    selectors: readonly string[],
    scope?: Selection,
  ): Selection | undefined {
    for (const selector of selectors) {
      const found = scope ? scope.find(selector) : $.root().find(selector);
      if (found.length > 0) return found.first();
    }
    return undefined;
  }

  /**
   * First non-empty normalized text among the selectors
   */
  static firstText(
    $: CheerioAPI,
    scope: Selection,
    selectors: readonly string[],
  ): string | undefined {
    for (const selector of selectors) {
      for (const element of scope.find(selector).toArray()) {
        const text = HtmlHelper.normalizeText($(element).text());
        if (text) return text;
      }
    }
    return undefined;
  }

  /**
   * content of <meta property=...> or <meta name=...>
   */
  static metaContent($: CheerioAPI, key: string): string | undefined {
    const content =
      $.root().find(`meta[property="${key}"]`).attr("content") ??
      $.root().find(`meta[name="${key}"]`).attr("content");
    const text = HtmlHelper.normalizeText(content);
    return text || undefined;
  }

  /**
   * First URL of a srcset list
   */
  static firstSrcsetCandidate(srcset: string | undefined): string | undefined {
    const first = (srcset ?? "").split(",")[0]?.trim().split(/\s+/)[0];
    return first || undefined;
  }

  /**
   * Absolute http(s) URL, or undefined for data: URIs, other schemes and
   * unparsable values
   */
  static resolveUrl(raw: string | undefined, baseUrl: string): string | undefined {
    const value = (raw ?? "").trim();
    if (!value || value.startsWith("data:")) return undefined;
    try {
      const url = new URL(value, baseUrl);
      return url.protocol === "http:" || url.protocol === "https:"
        ? url.toString()
        : undefined;
    } catch {
      return undefined;
    }
  }
}
