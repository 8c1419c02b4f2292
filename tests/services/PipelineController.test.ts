import { describe, it, expect, jest, beforeEach, afterEach } from "@jest/globals";
import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import { PipelineController } from "@/services/PipelineController";
import { RunStatusTracker } from "@/services/RunStatusTracker";
import {
  PipelineConfig,
  PipelineConfigInput,
  PipelineConfigSchema,
} from "@/core/domain/PipelineConfig";
import {
  FetchError,
  PipelineBusyError,
  PipelineStartupError,
  ScrapeErrorType,
} from "@/core/interfaces/ScrapeErrorType";
import { ResultSink } from "@/sink/ResultSink";
import {
  delay,
  FakeFetcherPool,
  FakeFetcherPoolOptions,
  FetchBehavior,
  hangUntilAborted,
  ProductPage,
  productHtml,
  silentLogger,
  snapshotFor,
} from "../helpers/fakes";

let tempDir: string;

const urls = (count: number): string[] =>
  Array.from({ length: count }, (_, i) => `https://shop.test/p/${i}`);

const succeed: FetchBehavior = async (url) =>
  snapshotFor(url, productHtml({ name: `Item ${url.split("/").pop()}` }));

const noWait = async (_ms: number): Promise<void> => undefined;

function buildConfig(input: PipelineConfigInput = {}): PipelineConfig {
  return PipelineConfigSchema.parse({
    concurrency: 2,
    output: { path: path.join(tempDir, "products.json") },
    ...input,
  });
}

function setup(
  behavior: FetchBehavior,
  input: PipelineConfigInput = {},
  poolOptions: FakeFetcherPoolOptions = {},
  sink = new ResultSink(silentLogger),
) {
  const config = buildConfig(input);
  const pool = new FakeFetcherPool(behavior, poolOptions);
  const controller = new PipelineController(config, {
    createFetcherPool: () => pool,
    sink,
    tracker: new RunStatusTracker({}, silentLogger),
    logger: silentLogger,
  });
  return { config, pool, controller };
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

async function readOutput(config: PipelineConfig): Promise<unknown[]> {
  const parsed: unknown = JSON.parse(await fs.readFile(config.output.path, "utf-8"));
  if (!Array.isArray(parsed)) throw new Error("output is not an array");
  return parsed;
}

describe("PipelineController", () => {
  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "pipeline-"));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("scrapes every URL and writes their records back in input order", async () => {
    const input = urls(3);
    const colors = ["red", "green", "blue"];
    const pageFor = (i: number): ProductPage => ({
      name: `Item ${i}`,
      code: `SKU-${i}`,
      attributes: [
        ["Color", colors[i]],
        ["Size", `${i + 1}0 cm`],
      ],
      images: [`/img/${i}.jpg`, `https://cdn.test/${i}-b.jpg`],
    });
    const { config, controller, pool } = setup(async (url) => {
      const i = input.indexOf(url);
      await delay((3 - i) * 5);
      return snapshotFor(url, productHtml(pageFor(i)));
    });

    const summary = await controller.run(input);

    expect(summary).toMatchObject({
      total: 3,
      successCount: 3,
      failureCount: 0,
      failuresByKind: {},
      cancelled: false,
    });
    expect(summary.sink).toMatchObject({ jsonWritten: true, apiSkipped: true });
    const output = await readOutput(config);
    expect(output).toEqual(
      input.map((url, i) => ({
        url,
        name: `Item ${i}`,
        productCode: `SKU-${i}`,
        attributes: { color: colors[i], size: `${i + 1}0 cm` },
        images: [`https://shop.test/img/${i}.jpg`, `https://cdn.test/${i}-b.jpg`],
        fetchedAt: "2024-01-01T00:00:00.000+00:00",
      })),
    );
    expect(
      output.map((element) =>
        isRecord(element) && isRecord(element.attributes)
          ? Object.keys(element.attributes)
          : [],
      ),
    ).toEqual([
      ["color", "size"],
      ["color", "size"],
      ["color", "size"],
    ]);
    expect(pool.initializeCalls).toBe(1);
    expect(pool.shutdownCalls).toBe(1);
  });

  it("records a definitive navigation failure after one fetch", async () => {
    const [url] = urls(1);
    const { config, controller, pool } = setup(async () => {
      throw new FetchError(ScrapeErrorType.NAVIGATION_FAILED, "HTTP 404", { url });
    });

    const summary = await controller.run([url]);

    expect(pool.calls(url)).toBe(1);
    expect(summary.failuresByKind).toEqual({ NAVIGATION_FAILED: 1 });
    expect(await readOutput(config)).toEqual([
      { url, error: "NAVIGATION_FAILED", message: "HTTP 404" },
    ]);
  });

  it("cancels queued work at the deadline and keeps finished results", async () => {
    const input = urls(5);
    const { config, controller } = setup(
      async (url, ctx) => {
        if (url === input[2]) await delay(300);
        return succeed(url, ctx);
      },
      { concurrency: 1, runDeadlineMs: 50, cancelGraceMs: 2000 },
    );

    const summary = await controller.run(input);

    expect(summary.cancelled).toBe(true);
    expect(summary.successCount).toBe(3);
    expect(summary.failuresByKind).toEqual({ CANCELLED: 2 });
    const output = await readOutput(config);
    expect(output).toHaveLength(5);
    expect(output.slice(3)).toEqual([
      { url: input[3], error: "CANCELLED", message: "Cancelled before start" },
      { url: input[4], error: "CANCELLED", message: "Cancelled before start" },
    ]);
  });

  it("keeps the output file when the API never accepts", async () => {
    const fetchImpl = jest.fn(
      async (..._args: Parameters<typeof fetch>): Promise<Response> =>
        new Response("", { status: 503 }),
    );
    const { config, controller } = setup(
      succeed,
      { api: { endpoint: "https://api.test/products", maxAttempts: 3 } },
      {},
      new ResultSink(silentLogger, { fetchImpl, wait: noWait }),
    );

    const summary = await controller.run(urls(2));

    expect(summary.sink).toMatchObject({
      jsonWritten: true,
      apiAccepted: false,
      apiSkipped: false,
      apiAttempts: 3,
    });
    expect(await readOutput(config)).toHaveLength(2);
  });

  it("applies the URL limit", async () => {
    const { config, controller, pool } = setup(succeed, { limit: 2 });

    const summary = await controller.run(urls(4));

    expect(summary.total).toBe(2);
    expect(pool.fetchOrder.sort()).toEqual(urls(2));
    expect(await readOutput(config)).toHaveLength(2);
  });

  it("writes an empty document without starting browsers", async () => {
    const { config, controller, pool } = setup(succeed);

    const summary = await controller.run([]);

    expect(summary.total).toBe(0);
    expect(pool.initializeCalls).toBe(0);
    expect(await fs.readFile(config.output.path, "utf-8")).toBe("[]\n");
  });

  it("counts browser start-up against the deadline", async () => {
    const input = urls(3);
    const { config, controller, pool } = setup(
      succeed,
      { runDeadlineMs: 50, cancelGraceMs: 0 },
      { initializeDelayMs: 400 },
    );

    const started = Date.now();
    const summary = await controller.run(input);
    const elapsed = Date.now() - started;

    expect(elapsed).toBeLessThan(300);
    expect(summary.cancelled).toBe(true);
    expect(summary.failuresByKind).toEqual({ CANCELLED: 3 });
    expect(await readOutput(config)).toEqual(
      input.map((url) => ({
        url,
        error: "CANCELLED",
        message: "Cancelled before start",
      })),
    );
    expect(pool.acquireCalls).toBe(0);
    expect(pool.shutdownCalls).toBe(0);

    // the launch is shut down once it completes
    await delay(450);
    expect(pool.shutdownCalls).toBe(1);
  });

  it("fails startup when no browser session launches", async () => {
    const { config, controller, pool } = setup(succeed, {}, { failInitialize: true });

    await expect(controller.run(urls(2))).rejects.toBeInstanceOf(PipelineStartupError);
    expect(pool.fetchOrder).toEqual([]);
    expect(pool.shutdownCalls).toBe(1);
    await expect(fs.access(config.output.path)).rejects.toThrow();
    expect(controller.getStatus().state).toBe("failed");
    expect(controller.isRunning).toBe(false);
  });

  it("fails startup when the output path is a directory", async () => {
    const outputDir = path.join(tempDir, "taken");
    await fs.mkdir(outputDir);
    const { controller, pool } = setup(succeed, { output: { path: outputDir } });

    const error = await controller.run(urls(1)).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PipelineStartupError);
    expect(error).toMatchObject({ message: `Output path is a directory: ${outputDir}` });
    expect(pool.initializeCalls).toBe(0);
  });

  it("rejects a second run while one is active and stops on request", async () => {
    const { controller } = setup((url, ctx) => hangUntilAborted(url, ctx.signal), {
      concurrency: 1,
    });

    const first = controller.run(urls(2));
    await delay(10);

    await expect(controller.run(urls(1))).rejects.toBeInstanceOf(PipelineBusyError);
    expect(controller.stop("test stop")).toBe(true);

    const summary = await first;
    expect(summary.cancelled).toBe(true);
    expect(summary.failuresByKind).toEqual({ CANCELLED: 2 });
    expect(controller.getStatus().state).toBe("stopped");
    expect(controller.stop()).toBe(false);
  });

  it("tracks progress in the run status", async () => {
    const { controller } = setup(succeed);

    const summary = await controller.run(urls(3));

    expect(controller.getStatus()).toMatchObject({
      state: "completed",
      runId: summary.runId,
      total: 3,
      processed: 3,
      succeeded: 3,
      failed: 0,
    });
  });
});
