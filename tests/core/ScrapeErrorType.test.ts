import { describe, it, expect } from "@jest/globals";
import {
  CancelledError,
  ConfigError,
  ExtractionError,
  FetchError,
  ScrapeErrorType,
  SinkError,
  toTaskErrorKind,
} from "@/core/interfaces/ScrapeErrorType";

describe("ScrapeErrorType", () => {
  it("marks only TIMEOUT and BROWSER_CRASHED fetch errors retryable", () => {
    expect(new FetchError(ScrapeErrorType.TIMEOUT, "t").retryable).toBe(true);
    expect(new FetchError(ScrapeErrorType.BROWSER_CRASHED, "c").retryable).toBe(true);
    expect(new FetchError(ScrapeErrorType.NAVIGATION_FAILED, "n").retryable).toBe(false);
    expect(new ExtractionError("m").retryable).toBe(false);
  });

  it("maps thrown values to task error kinds", () => {
    expect(toTaskErrorKind(new ExtractionError("m"))).toBe(ScrapeErrorType.MALFORMED_PAGE);
    expect(toTaskErrorKind(new CancelledError())).toBe(ScrapeErrorType.CANCELLED);
    expect(
      toTaskErrorKind(new SinkError(ScrapeErrorType.WRITE_FAILED, "w")),
    ).toBe(ScrapeErrorType.UNKNOWN_ERROR);
    expect(toTaskErrorKind(new Error("boom"))).toBe(ScrapeErrorType.UNKNOWN_ERROR);
    expect(toTaskErrorKind("boom")).toBe(ScrapeErrorType.UNKNOWN_ERROR);
  });

  it("includes the status code in sink error log objects", () => {
    const error = new SinkError(ScrapeErrorType.API_REJECTED, "HTTP 400", {
      url: "https://api.test/products",
      statusCode: 400,
    });

    expect(error.toLogObject()).toEqual({
      errorType: "API_REJECTED",
      message: "HTTP 400",
      url: "https://api.test/products",
      retryable: false,
      statusCode: 400,
    });
  });

  it("joins config issues into the message", () => {
    const error = new ConfigError("Invalid configuration", ["a: bad", "b: worse"]);

    expect(error.message).toBe("Invalid configuration: a: bad; b: worse");
    expect(error.issues).toEqual(["a: bad", "b: worse"]);
  });
});
