/**
 * Pipeline configuration schema
 *
 * Every field has a default, so an empty object is a valid configuration.
 */

import { z } from "zod";

const RowAttributeSourceSchema = z.object({
  type: z.literal("rows"),
  /** Elements each holding one name/value pair */
  row: z.string().min(1),
  name: z.string().min(1),
  value: z.string().min(1),
});

const DefinitionListSourceSchema = z.object({
  type: z.literal("definition-list"),
  /** <dl> elements; each <dt> pairs with the next <dd> */
  list: z.string().min(1),
});

export const AttributeSourceSchema = z.discriminatedUnion("type", [
  RowAttributeSourceSchema,
  DefinitionListSourceSchema,
]);

export const ExtractorSelectorsSchema = z.object({
  contentRoot: z
    .array(z.string().min(1))
    .min(1)
    .default([
      "[itemtype*='schema.org/Product']",
      "[data-product-root]",
      ".product-page",
      ".product-card",
      ".product",
      "#product",
      "main",
      "article",
    ]),
  name: z
    .array(z.string().min(1))
    .default([
      "h1.title",
      "h1.pdp-header__title",
      "h1.product-title",
      "h1[class*='title']",
      "[itemprop='name']",
      "h1",
    ]),
  productCode: z
    .array(z.string().min(1))
    .default([
      ".product-code-container span:last-child",
      ".product-code",
      "[data-product-code]",
      "[itemprop='sku']",
    ]),
  gallery: z
    .array(z.string().min(1))
    .default([
      ".wrapper.mv-hide-scrollbar",
      ".product-gallery",
      ".product-images",
      ".pdp-gallery",
      "[data-gallery]",
    ]),
  imageAttributes: z
    .array(z.string().min(1))
    .min(1)
    .default(["src", "data-src", "data-original"]),
  attributes: z
    .array(AttributeSourceSchema)
    .default([
      {
        type: "rows",
        row: "dl.characteristics__list > mvid-item-with-dots",
        name: "dt",
        value: "dd",
      },
      {
        type: "rows",
        row: "[itemprop='additionalProperty']",
        name: "[itemprop='name']",
        value: "[itemprop='value']",
      },
      { type: "rows", row: "table tr", name: "th", value: "td" },
      { type: "definition-list", list: "dl" },
    ]),
  /**
   * Path segment of a separate characteristics page, appended to the product
   * URL (e.g. "specification" → {url}/specification). Unset: not fetched.
   */
  specificationPath: z
    .string()
    .trim()
    .min(1)
    .regex(/^[^?#]+$/, "specificationPath must be a plain path segment")
    .optional(),
  /** Attribute sources read on the characteristics page */
  specificationAttributes: z
    .array(AttributeSourceSchema)
    .default([
      {
        type: "rows",
        row: "section.characteristics__group dl.characteristics__list > mvid-item-with-dots",
        name: "dt",
        value: "dd",
      },
      { type: "rows", row: "table tr", name: "th", value: "td" },
    ]),
});

export const BrowserConfigSchema = z.object({
  /** Independent browser sessions; defaults to the concurrency */
  sessions: z.number().int().positive().optional(),
  headless: z.boolean().default(true),
  navigationTimeoutMs: z.number().int().positive().default(30000),
  waitUntil: z
    .enum(["load", "domcontentloaded", "networkidle", "commit"])
    .default("domcontentloaded"),
  /** Extra wait after navigation for client-rendered content */
  settleDelayMs: z.number().int().min(0).default(0),
  userAgents: z
    .array(z.string().min(1))
    .min(1)
    .default([
      "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36",
      "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36",
      "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36",
    ]),
  locale: z.string().min(1).default("en-US"),
  viewport: z
    .object({
      width: z.number().int().positive(),
      height: z.number().int().positive(),
    })
    .default({ width: 1920, height: 1080 }),
  args: z.array(z.string()).optional(),
});

export const RetryConfigSchema = z.object({
  /** Extra attempts for TIMEOUT / BROWSER_CRASHED */
  maxRetries: z.number().int().min(0).default(2),
  retryDelayMs: z.number().int().min(0).default(0),
});

export const PolitenessConfigSchema = z
  .object({
    minDelayMs: z.number().int().min(0).default(0),
    maxDelayMs: z.number().int().min(0).default(0),
  })
  .refine((p) => p.minDelayMs <= p.maxDelayMs, {
    message: "politeness.minDelayMs must be <= politeness.maxDelayMs",
  });

export const OutputConfigSchema = z.object({
  path: z.string().min(1).default("./results/products.json"),
  statusPath: z.string().min(1).optional(),
});

export const ApiConfigSchema = z.object({
  endpoint: z.string().url().optional(),
  authToken: z.string().min(1).optional(),
  mode: z.enum(["document", "per-record"]).default("document"),
  timeoutMs: z.number().int().positive().default(30000),
  maxAttempts: z.number().int().positive().default(3),
  backoffBaseMs: z.number().int().min(0).default(1000),
  backoffMaxMs: z.number().int().min(0).default(30000),
});

export const PipelineConfigSchema = z.object({
  concurrency: z.number().int().positive().default(2),
  /** Process only the first N URLs (0 = all) */
  limit: z.number().int().min(0).default(0),
  runDeadlineMs: z.number().int().positive().optional(),
  /** Wait for in-flight tasks after cancellation before sealing the run */
  cancelGraceMs: z.number().int().min(0).default(5000),
  browser: BrowserConfigSchema.default({}),
  retry: RetryConfigSchema.default({}),
  politeness: PolitenessConfigSchema.default({}),
  output: OutputConfigSchema.default({}),
  api: ApiConfigSchema.default({}),
  extractor: ExtractorSelectorsSchema.default({}),
});

export type AttributeSource = z.infer<typeof AttributeSourceSchema>;
export type ExtractorSelectors = z.infer<typeof ExtractorSelectorsSchema>;
export type BrowserConfig = z.infer<typeof BrowserConfigSchema>;
export type RetryConfig = z.infer<typeof RetryConfigSchema>;
export type PolitenessConfig = z.infer<typeof PolitenessConfigSchema>;
export type OutputConfig = z.infer<typeof OutputConfigSchema>;
export type ApiConfig = z.infer<typeof ApiConfigSchema>;
export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;

/** Loosely typed input accepted before validation */
export type PipelineConfigInput = z.input<typeof PipelineConfigSchema>;
