import { describe, it, expect, beforeEach, afterEach } from "@jest/globals";
import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import { JsonResultWriter } from "@/sink/JsonResultWriter";
import { ScrapeErrorType, SinkError } from "@/core/interfaces/ScrapeErrorType";
import { silentLogger } from "../helpers/fakes";

let tempDir: string;

describe("JsonResultWriter", () => {
  const writer = new JsonResultWriter(silentLogger);

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "json-writer-"));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("writes indented JSON with a trailing newline", async () => {
    const target = path.join(tempDir, "out.json");

    const result = await writer.write([{ url: "https://shop.test/p/1" }], target);

    const content = await fs.readFile(target, "utf-8");
    expect(content).toBe('[\n  {\n    "url": "https://shop.test/p/1"\n  }\n]\n');
    expect(result).toEqual({ outputPath: target, bytes: Buffer.byteLength(content) });
  });

  it("creates missing directories", async () => {
    const target = path.join(tempDir, "a", "b", "out.json");

    await writer.write([], target);

    expect(await fs.readFile(target, "utf-8")).toBe("[]\n");
  });

  it("replaces an existing file and leaves no temporary files", async () => {
    const target = path.join(tempDir, "out.json");
    await fs.writeFile(target, "old");

    await writer.write({ run: 2 }, target);

    expect(JSON.parse(await fs.readFile(target, "utf-8"))).toEqual({ run: 2 });
    expect(await fs.readdir(tempDir)).toEqual(["out.json"]);
  });

  it("keeps the previous file when serialization fails", async () => {
    const target = path.join(tempDir, "out.json");
    await fs.writeFile(target, "old");
    const circular: Record<string, unknown> = {};
    circular.self = circular;

    const error = await writer.write(circular, target).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SinkError);
    expect(error).toMatchObject({ type: ScrapeErrorType.WRITE_FAILED });
    expect(await fs.readFile(target, "utf-8")).toBe("old");
    expect(await fs.readdir(tempDir)).toEqual(["out.json"]);
  });

  it("reports WRITE_FAILED when the directory cannot be created", async () => {
    const blocker = path.join(tempDir, "blocker");
    await fs.writeFile(blocker, "");
    const target = path.join(blocker, "out.json");

    await expect(writer.write([], target)).rejects.toMatchObject({
      type: ScrapeErrorType.WRITE_FAILED,
      message: expect.stringContaining(`Failed to write ${target}:`),
    });
  });

  it("names temporary files after the target in the same directory", () => {
    const temp = JsonResultWriter.tempPathFor("/data/out/products.json");

    expect(path.dirname(temp)).toBe("/data/out");
    expect(path.basename(temp)).toMatch(
      new RegExp(`^products\\.json\\.${process.pid}\\.[0-9a-f]{8}\\.tmp$`),
    );
  });
});
