/**
 * Result Sink
 *
 * Writes the run result as one JSON document, then forwards it to the
 * downstream API. The API is only called once the file is on disk, and an
 * API failure never fails the run.
 */

import { logger as rootLogger, Logger } from "@/config/logger";
import type { ApiConfig } from "@/core/domain/PipelineConfig";
import type { RunResult } from "@/core/domain/RunResult";
import type { SinkReport } from "@/core/domain/SinkReport";
import {
  errorMessage,
  ScrapeErrorType,
  SinkError,
} from "@/core/interfaces/ScrapeErrorType";
import { ApiSubmitter, ApiSubmitterDeps } from "./ApiSubmitter";
import { JsonResultWriter } from "./JsonResultWriter";
import {
  buildOutputDocument,
  isSuccessElement,
  OutputElement,
} from "./OutputDocument";

export interface EmitOptions {
  outputPath: string;
  api?: ApiConfig;
}

export class ResultSink {
  private readonly writer: JsonResultWriter;

  constructor(
    private readonly logger: Logger = rootLogger,
    private readonly submitterDeps: ApiSubmitterDeps = {},
  ) {
    this.writer = new JsonResultWriter(logger);
  }

  async emit(result: RunResult, options: EmitOptions): Promise<SinkReport> {
    const document = buildOutputDocument(result);
    const report: SinkReport = {
      outputPath: options.outputPath,
      jsonWritten: false,
      apiAccepted: false,
      apiSkipped: true,
      apiAttempts: 0,
      errors: [],
    };

    try {
      const written = await this.writer.write(document, options.outputPath);
      report.outputPath = written.outputPath;
      report.jsonWritten = true;
    } catch (error) {
      report.errors.push(
        error instanceof SinkError
          ? error
          : new SinkError(ScrapeErrorType.WRITE_FAILED, errorMessage(error), {
              cause: error,
            }),
      );
      return report;
    }

    const api = options.api;
    if (!api?.endpoint) {
      this.logger.debug("No API endpoint configured, submission skipped");
      return report;
    }

    const submitter = new ApiSubmitter(
      { ...api, endpoint: api.endpoint },
      { logger: this.logger, ...this.submitterDeps },
    );
    report.apiSkipped = false;

    if (api.mode === "per-record") {
      await this.submitPerRecord(submitter, document, report);
    } else {
      const submitted = await submitter.submit(document);
      report.apiAttempts = submitted.attempts;
      report.apiAccepted = submitted.accepted;
      if (submitted.error) report.errors.push(submitted.error);
    }

    if (!report.apiAccepted && !report.apiSkipped) {
      this.logger.warn(
        {
          endpoint: api.endpoint,
          errors: report.errors.map((e) => e.toLogObject()),
        },
        "API submission not accepted; output kept on disk",
      );
    }
    return report;
  }

  /**
   * One request per success element; failures stay in the file only
   */
  private async submitPerRecord(
    submitter: ApiSubmitter,
    document: OutputElement[],
    report: SinkReport,
  ): Promise<void> {
    const records = document.filter(isSuccessElement);
    if (records.length === 0) {
      this.logger.info("No successful records to submit, API call skipped");
      report.apiSkipped = true;
      return;
    }

    let allAccepted = true;
    for (const element of records) {
      const submitted = await submitter.submit(element);
      report.apiAttempts += submitted.attempts;
      if (!submitted.accepted) {
        allAccepted = false;
        if (submitted.error) report.errors.push(submitted.error);
      }
    }
    report.apiAccepted = allAccepted;
  }
}
