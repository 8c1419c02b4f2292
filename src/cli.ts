#!/usr/bin/env node
/**
 * product-harvest CLI
 *
 * Loads the URL list, runs the pipeline once and prints the run summary as
 * JSON. SIGINT / SIGTERM stop the run; the partial result is still written.
 *
 * Exit codes: 0 output written, 1 fatal error, 2 output file not written
 */

import "dotenv/config";
import { parseCliArgs, USAGE } from "@/config/CliArgs";
import { ConfigLoader } from "@/config/ConfigLoader";
import { logger } from "@/config/logger";
import type { RunSummary } from "@/core/domain/RunSummary";
import { ConfigError, errorMessage } from "@/core/interfaces/ScrapeErrorType";
import { UrlListLoader } from "@/input/UrlListLoader";
import { PipelineController } from "@/services/PipelineController";

function printSummary(summary: RunSummary): void {
  const printable = {
    ...summary,
    sink: {
      ...summary.sink,
      errors: summary.sink.errors.map((error) => error.toLogObject()),
    },
  };
  process.stdout.write(JSON.stringify(printable, null, 2) + "\n");
}

async function main(): Promise<number> {
  const args = parseCliArgs(process.argv.slice(2));
  if (args.help || !args.inputPath) {
    process.stdout.write(USAGE);
    return 0;
  }

  const config = ConfigLoader.load({
    filePath: args.configPath,
    overrides: args.overrides,
  });
  const urls = await new UrlListLoader().load(args.inputPath);
  const controller = new PipelineController(config);

  const onSignal = (signal: NodeJS.Signals): void => {
    logger.warn({ signal }, "Signal received, stopping run");
    controller.stop(`Received ${signal}`);
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  try {
    const summary = await controller.run(urls);
    printSummary(summary);
    return summary.sink.jsonWritten ? 0 : 2;
  } finally {
    process.removeListener("SIGINT", onSignal);
    process.removeListener("SIGTERM", onSignal);
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    if (error instanceof ConfigError) {
      process.stderr.write(`${error.message}\n\n${USAGE}`);
    }
    logger.fatal({ error: errorMessage(error) }, "product-harvest failed");
    process.exitCode = 1;
  });
