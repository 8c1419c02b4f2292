import { describe, it, expect, beforeEach, afterEach } from "@jest/globals";
import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import { UrlListLoader } from "@/input/UrlListLoader";
import { ConfigError } from "@/core/interfaces/ScrapeErrorType";
import { silentLogger } from "../helpers/fakes";

describe("UrlListLoader", () => {
  const loader = new UrlListLoader(silentLogger);

  describe("parse", () => {
    it("reads one URL per line, skipping blanks and comments", () => {
      const content = [
        "# catalogue",
        "https://shop.test/p/1",
        "",
        "   https://shop.test/p/2  ",
        "\t# disabled: https://shop.test/p/3",
      ].join("\r\n");

      expect(loader.parse(content, "text")).toEqual([
        "https://shop.test/p/1",
        "https://shop.test/p/2",
      ]);
    });

    it("keeps duplicates and order", () => {
      expect(
        loader.parse("https://shop.test/a\nhttps://shop.test/b\nhttps://shop.test/a", "text"),
      ).toEqual(["https://shop.test/a", "https://shop.test/b", "https://shop.test/a"]);
    });

    it("accepts JSON strings and { url } objects", () => {
      const content = JSON.stringify([
        "https://shop.test/p/1",
        { url: " https://shop.test/p/2 ", sku: "X" },
      ]);

      expect(loader.parse(content, "json")).toEqual([
        "https://shop.test/p/1",
        "https://shop.test/p/2",
      ]);
    });

    it("skips entries that are not http(s) URLs", () => {
      expect(
        loader.parse("ftp://shop.test/file\nnot a url\nhttp://shop.test/ok", "text"),
      ).toEqual(["http://shop.test/ok"]);
    });

    it("rejects malformed JSON", () => {
      expect(() => loader.parse("[", "json")).toThrow(ConfigError);
    });

    it("rejects JSON that is not a list of URLs", () => {
      expect(() => loader.parse('{"urls": []}', "json")).toThrow(
        "URL list must be an array of strings or { url } objects",
      );
      expect(() => loader.parse("[1]", "json")).toThrow(ConfigError);
    });
  });

  describe("load", () => {
    let tempDir: string;

    beforeEach(async () => {
      tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "url-list-"));
    });

    afterEach(async () => {
      await fs.rm(tempDir, { recursive: true, force: true });
    });

    it("picks the format from the file extension", async () => {
      const jsonPath = path.join(tempDir, "urls.JSON");
      const textPath = path.join(tempDir, "urls.txt");
      await fs.writeFile(jsonPath, '["https://shop.test/j"]');
      await fs.writeFile(textPath, "https://shop.test/t\n");

      expect(await loader.load(jsonPath)).toEqual(["https://shop.test/j"]);
      expect(await loader.load(textPath)).toEqual(["https://shop.test/t"]);
    });

    it("reports an unreadable file", async () => {
      const missing = path.join(tempDir, "missing.txt");

      await expect(loader.load(missing)).rejects.toThrow(
        `URL list not readable: ${missing}`,
      );
    });
  });
});
