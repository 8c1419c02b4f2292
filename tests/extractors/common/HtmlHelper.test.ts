import { describe, it, expect } from "@jest/globals";
import { load } from "cheerio";
import { HtmlHelper } from "@/extractors/common/HtmlHelper";

describe("HtmlHelper", () => {
  it("normalizeText collapses whitespace including no-break spaces", () => {
    expect(HtmlHelper.normalizeText("  a \n\t b c  ")).toBe("a b c");
    expect(HtmlHelper.normalizeText(undefined)).toBe("");
  });

  it("normalizeKey strips a trailing colon and lower-cases", () => {
    expect(HtmlHelper.normalizeKey("  Screen  Size : ")).toBe("screen size");
    expect(HtmlHelper.normalizeKey("Color:")).toBe("color");
  });

  it("firstMatch tries selectors in order", () => {
    const $ = load(`<div class="b">B</div><div class="a">A</div>`);

    expect(HtmlHelper.firstMatch($, [".missing", ".a", ".b"])?.text()).toBe("A");
    expect(HtmlHelper.firstMatch($, [".missing"])).toBeUndefined();
  });

  it("firstMatch stays inside the given scope", () => {
    const $ = load(`<p class="x">out</p><section><p class="x">in</p></section>`);
    const scope = $.root().find("section").first();

    expect(HtmlHelper.firstMatch($, [".x"], scope)?.text()).toBe("in");
  });

  it("firstText skips empty matches", () => {
    const $ = load(`<main><h1> </h1><h1>Title</h1></main>`);

    expect(HtmlHelper.firstText($, $.root().find("main"), ["h1"])).toBe("Title");
  });

  it("metaContent reads property before name", () => {
    const $ = load(
      `<meta name="description" content=" Plain "><meta property="og:title" content="OG">`,
    );

    expect(HtmlHelper.metaContent($, "og:title")).toBe("OG");
    expect(HtmlHelper.metaContent($, "description")).toBe("Plain");
    expect(HtmlHelper.metaContent($, "og:image")).toBeUndefined();
  });

  it("firstSrcsetCandidate returns the first URL", () => {
    expect(HtmlHelper.firstSrcsetCandidate(" /a.jpg 1x, /b.jpg 2x")).toBe("/a.jpg");
    expect(HtmlHelper.firstSrcsetCandidate("")).toBeUndefined();
  });

  it("resolveUrl returns absolute http(s) URLs only", () => {
    const base = "https://shop.test/p/1";

    expect(HtmlHelper.resolveUrl("/img/a.jpg", base)).toBe("https://shop.test/img/a.jpg");
    expect(HtmlHelper.resolveUrl("//cdn.test/b.jpg", base)).toBe("https://cdn.test/b.jpg");
    expect(HtmlHelper.resolveUrl("data:image/gif;base64,R0", base)).toBeUndefined();
    expect(HtmlHelper.resolveUrl("javascript:void(0)", base)).toBeUndefined();
    expect(HtmlHelper.resolveUrl("   ", base)).toBeUndefined();
  });
});
