/**
 * API Submitter
 *
 * POSTs JSON to the downstream endpoint.
 * - network errors, timeouts, 5xx: retried with exponential backoff
 *   min(backoffBaseMs * 2^(attempt-1), backoffMaxMs), maxAttempts in total
 * - 4xx: definitive rejection
 */

import { logger as rootLogger, Logger } from "@/config/logger";
import type { ApiConfig } from "@/core/domain/PipelineConfig";
import {
  errorMessage,
  ScrapeErrorType,
  SinkError,
} from "@/core/interfaces/ScrapeErrorType";
import { sleep } from "@/utils/sleep";

export type ApiTarget = Omit<ApiConfig, "endpoint" | "mode"> & {
  endpoint: string;
};

export interface SubmitResult {
  accepted: boolean;
  attempts: number;
  statusCode?: number;
  error?: SinkError;
}

export interface ApiSubmitterDeps {
  fetchImpl?: typeof fetch;
  wait?: (ms: number) => Promise<void>;
  logger?: Logger;
}

const ERROR_BODY_PREVIEW = 200;

export class ApiSubmitter {
  private readonly fetchImpl: typeof fetch;
  private readonly wait: (ms: number) => Promise<void>;
  private readonly logger: Logger;

  constructor(
    private readonly target: ApiTarget,
    deps: ApiSubmitterDeps = {},
  ) {
    this.fetchImpl = deps.fetchImpl ?? fetch;
    this.wait = deps.wait ?? ((ms) => sleep(ms));
    this.logger = deps.logger ?? rootLogger;
  }

  /**
   * Delay before the attempt following `attempt` (1-based)
   */
  backoffDelay(attempt: number): number {
    return Math.min(
      this.target.backoffBaseMs * 2 ** (attempt - 1),
      this.target.backoffMaxMs,
    );
  }

  /**
   * Never throws; a failed submission is reported in the result
   */
  async submit(body: unknown): Promise<SubmitResult> {
    let payload: string;
    try {
      payload = JSON.stringify(body);
    } catch (error) {
      return {
        accepted: false,
        attempts: 0,
        error: new SinkError(
          ScrapeErrorType.API_REJECTED,
          `Payload not serializable: ${errorMessage(error)}`,
          { url: this.target.endpoint, cause: error },
        ),
      };
    }
    return this.postWithRetry(payload, 1);
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
    };
    if (this.target.authToken) {
      headers.Authorization = `Bearer ${this.target.authToken}`;
    }
    return headers;
  }

  private async postWithRetry(
    payload: string,
    attempt: number,
  ): Promise<SubmitResult> {
    const { endpoint, maxAttempts, timeoutMs } = this.target;

    let response: Response;
    try {
      response = await this.fetchImpl(endpoint, {
        method: "POST",
        headers: this.headers(),
        body: payload,
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (error) {
      const reason =
        error instanceof Error &&
        (error.name === "TimeoutError" || error.name === "AbortError")
          ? "Request timeout"
          : errorMessage(error);

      if (attempt < maxAttempts) {
        return this.retry(payload, attempt, reason);
      }
      return {
        accepted: false,
        attempts: attempt,
        error: new SinkError(
          ScrapeErrorType.API_REJECTED,
          `API request failed after ${attempt} attempts: ${reason}`,
          { url: endpoint, cause: error },
        ),
      };
    }

    if (response.ok) {
      this.logger.info(
        { endpoint, status: response.status, attempts: attempt },
        "API accepted submission",
      );
      return { accepted: true, attempts: attempt, statusCode: response.status };
    }

    const status = response.status;
    if (status >= 500 && attempt < maxAttempts) {
      await this.discardBody(response);
      return this.retry(payload, attempt, `Server error: ${status}`);
    }

    const detail = await this.readBody(response);
    const message =
      status >= 500
        ? `API server error ${status} after ${attempt} attempts`
        : `API rejected submission: HTTP ${status}`;
    return {
      accepted: false,
      attempts: attempt,
      statusCode: status,
      error: new SinkError(
        ScrapeErrorType.API_REJECTED,
        detail ? `${message} (${detail})` : message,
        { url: endpoint, statusCode: status },
      ),
    };
  }

  private async retry(
    payload: string,
    attempt: number,
    reason: string,
  ): Promise<SubmitResult> {
    const delay = this.backoffDelay(attempt);
    this.logger.warn(
      {
        endpoint: this.target.endpoint,
        attempt,
        max_attempts: this.target.maxAttempts,
        delay_ms: delay,
        reason,
      },
      "API submission failed, retrying",
    );
    await this.wait(delay);
    return this.postWithRetry(payload, attempt + 1);
  }

  private async readBody(response: Response): Promise<string> {
    try {
      const text = await response.text();
      return text.trim().slice(0, ERROR_BODY_PREVIEW);
    } catch (error) {
      this.logger.debug(
        { error: errorMessage(error) },
        "Error response body unreadable",
      );
      return "";
    }
  }

  /**
   * Releases the connection held by an unread response body
   */
  private async discardBody(response: Response): Promise<void> {
    try {
      await response.body?.cancel();
    } catch (error) {
      this.logger.debug(
        { error: errorMessage(error) },
        "Response body could not be discarded",
      );
    }
  }
}
