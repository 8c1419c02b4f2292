import { describe, it, expect, jest } from "@jest/globals";
import { ApiSubmitter, ApiTarget } from "@/sink/ApiSubmitter";
import { ScrapeErrorType } from "@/core/interfaces/ScrapeErrorType";
import { silentLogger } from "../helpers/fakes";

const target: ApiTarget = {
  endpoint: "https://api.test/products",
  authToken: "test-token",
  timeoutMs: 1000,
  maxAttempts: 3,
  backoffBaseMs: 1000,
  backoffMaxMs: 30000,
};

type FetchArgs = Parameters<typeof fetch>;

/**
 * fetch stand-in answering with the given responses in turn (the last one
 * repeats)
 */
function respondWith(...responses: Array<() => Response>) {
  let call = 0;
  return jest.fn(async (..._args: FetchArgs): Promise<Response> => {
    const next = responses[Math.min(call, responses.length - 1)];
    call++;
    return next();
  });
}

const status = (code: number, body = "") => () => new Response(body, { status: code });

function createSubmitter(
  fetchImpl: typeof fetch,
  overrides: Partial<ApiTarget> = {},
) {
  const wait = jest.fn(async (_ms: number) => undefined);
  const submitter = new ApiSubmitter(
    { ...target, ...overrides },
    { fetchImpl, wait, logger: silentLogger },
  );
  return { submitter, wait };
}

describe("ApiSubmitter", () => {
  it("POSTs the JSON body with auth headers", async () => {
    const fetchImpl = respondWith(status(201));
    const { submitter } = createSubmitter(fetchImpl);

    const result = await submitter.submit([{ url: "https://shop.test/p/1" }]);

    expect(result).toEqual({ accepted: true, attempts: 1, statusCode: 201 });
    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe("https://api.test/products");
    expect(init).toMatchObject({
      method: "POST",
      body: '[{"url":"https://shop.test/p/1"}]',
      headers: {
        "Content-Type": "application/json",
        Authorization: "Bearer test-token",
      },
    });
  });

  it("omits the Authorization header without a token", async () => {
    const fetchImpl = respondWith(status(200));
    const { submitter } = createSubmitter(fetchImpl, { authToken: undefined });

    await submitter.submit({});

    expect(fetchImpl.mock.calls[0][1]?.headers).toEqual({
      "Content-Type": "application/json",
    });
  });

  it("retries server errors with exponential backoff", async () => {
    const fetchImpl = respondWith(status(503), status(502), status(200));
    const { submitter, wait } = createSubmitter(fetchImpl);

    const result = await submitter.submit({});

    expect(result.accepted).toBe(true);
    expect(result.attempts).toBe(3);
    expect(wait.mock.calls.map(([ms]) => ms)).toEqual([1000, 2000]);
  });

  it("releases the body of a server error before retrying", async () => {
    const failed = new Response("busy", { status: 503 });
    const fetchImpl = respondWith(() => failed, status(200));
    const { submitter } = createSubmitter(fetchImpl);

    const result = await submitter.submit({});

    expect(result.accepted).toBe(true);
    expect(failed.bodyUsed).toBe(true);
  });

  it("gives up after maxAttempts server errors", async () => {
    const fetchImpl = respondWith(status(503, "unavailable"));
    const { submitter, wait } = createSubmitter(fetchImpl);

    const result = await submitter.submit({});

    expect(fetchImpl).toHaveBeenCalledTimes(3);
    expect(wait).toHaveBeenCalledTimes(2);
    expect(result).toMatchObject({ accepted: false, attempts: 3, statusCode: 503 });
    expect(result.error).toMatchObject({
      type: ScrapeErrorType.API_REJECTED,
      message: "API server error 503 after 3 attempts (unavailable)",
      statusCode: 503,
    });
  });

  it("does not retry a client error", async () => {
    const fetchImpl = respondWith(status(400, "bad payload"));
    const { submitter, wait } = createSubmitter(fetchImpl);

    const result = await submitter.submit({});

    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(wait).not.toHaveBeenCalled();
    expect(result.error?.message).toBe("API rejected submission: HTTP 400 (bad payload)");
  });

  it("treats 429 as a definitive rejection", async () => {
    const fetchImpl = respondWith(status(429));
    const { submitter } = createSubmitter(fetchImpl);

    const result = await submitter.submit({});

    expect(result).toMatchObject({ accepted: false, attempts: 1, statusCode: 429 });
    expect(result.error?.message).toBe("API rejected submission: HTTP 429");
  });

  it("retries network errors and reports the last reason", async () => {
    const fetchImpl = jest.fn(async (..._args: FetchArgs): Promise<Response> => {
      throw new TypeError("fetch failed: ECONNREFUSED");
    });
    const { submitter } = createSubmitter(fetchImpl);

    const result = await submitter.submit({});

    expect(fetchImpl).toHaveBeenCalledTimes(3);
    expect(result.accepted).toBe(false);
    expect(result.statusCode).toBeUndefined();
    expect(result.error?.message).toBe(
      "API request failed after 3 attempts: fetch failed: ECONNREFUSED",
    );
  });

  it("reports request timeouts", async () => {
    const fetchImpl = jest.fn(async (..._args: FetchArgs): Promise<Response> => {
      const error = new Error("The operation was aborted due to timeout");
      error.name = "TimeoutError";
      throw error;
    });
    const { submitter } = createSubmitter(fetchImpl, { maxAttempts: 1 });

    const result = await submitter.submit({});

    expect(result.error?.message).toBe("API request failed after 1 attempts: Request timeout");
  });

  it("does not call the API for a payload that cannot be serialized", async () => {
    const fetchImpl = respondWith(status(200));
    const { submitter } = createSubmitter(fetchImpl);
    const circular: Record<string, unknown> = {};
    circular.self = circular;

    const result = await submitter.submit(circular);

    expect(fetchImpl).not.toHaveBeenCalled();
    expect(result.attempts).toBe(0);
    expect(result.error?.type).toBe(ScrapeErrorType.API_REJECTED);
  });

  it("caps the backoff delay", () => {
    const { submitter } = createSubmitter(respondWith(status(200)), {
      backoffBaseMs: 1000,
      backoffMaxMs: 3000,
    });

    expect([1, 2, 3, 4].map((attempt) => submitter.backoffDelay(attempt))).toEqual([
      1000, 2000, 3000, 3000,
    ]);
  });
});
