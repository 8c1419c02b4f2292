/**
 * URL list loader
 *
 * Accepted inputs:
 * - .json: array of URL strings or of { url } objects
 * - anything else: one URL per line; blank lines and # comments ignored
 *
 * Entries that are not absolute http(s) URLs are skipped with a warning.
 */

import * as fs from "fs/promises";
import * as path from "path";
import { z } from "zod";
import { logger as rootLogger, Logger } from "@/config/logger";
import { ConfigError, errorMessage } from "@/core/interfaces/ScrapeErrorType";

const UrlListSchema = z.array(
  z.union([z.string(), z.object({ url: z.string() }).passthrough()]),
);

export type UrlListFormat = "json" | "text";

export class UrlListLoader {
  constructor(private readonly logger: Logger = rootLogger) {}

  /**
   * @throws ConfigError when the file is unreadable or not a valid list
   */
  async load(filePath: string): Promise<string[]> {
    let content: string;
    try {
      content = await fs.readFile(filePath, "utf-8");
    } catch (error) {
      throw new ConfigError(
        `URL list not readable: ${filePath} (${errorMessage(error)})`,
      );
    }

    const format: UrlListFormat =
      path.extname(filePath).toLowerCase() === ".json" ? "json" : "text";
    const urls = this.parse(content, format);
    this.logger.info({ filePath, count: urls.length }, "URL list loaded");
    return urls;
  }

  parse(content: string, format: UrlListFormat): string[] {
    const entries =
      format === "json" ? this.parseJson(content) : this.parseText(content);
    return entries.filter((entry) => this.isHttpUrl(entry));
  }

  private parseJson(content: string): string[] {
    let document: unknown;
    try {
      document = JSON.parse(content);
    } catch (error) {
      throw new ConfigError(`URL list is not valid JSON: ${errorMessage(error)}`);
    }

    const parsed = UrlListSchema.safeParse(document);
    if (!parsed.success) {
      throw new ConfigError(
        "URL list must be an array of strings or { url } objects",
        parsed.error.issues.map(
          (issue) => `[${issue.path.join(".")}] ${issue.message}`,
        ),
      );
    }
    return parsed.data.map((entry) =>
      (typeof entry === "string" ? entry : entry.url).trim(),
    );
  }

  private parseText(content: string): string[] {
    return content
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line !== "" && !line.startsWith("#"));
  }

  private isHttpUrl(entry: string): boolean {
    try {
      const url = new URL(entry);
      if (url.protocol === "http:" || url.protocol === "https:") return true;
    } catch {
      // fall through to the warning
    }
    this.logger.warn({ entry }, "Skipping entry that is not an http(s) URL");
    return false;
  }
}
