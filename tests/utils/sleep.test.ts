import { describe, it, expect, jest, beforeEach, afterEach } from "@jest/globals";
import { sleep } from "@/utils/sleep";

describe("sleep", () => {
  beforeEach(() => {
    jest.useFakeTimers();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it("resolves after the delay", async () => {
    let done = false;
    const pending = sleep(100).then(() => {
      done = true;
    });

    await jest.advanceTimersByTimeAsync(99);
    expect(done).toBe(false);
    await jest.advanceTimersByTimeAsync(1);
    await pending;
    expect(done).toBe(true);
  });

  it("resolves at once for non-positive delays or an aborted signal", async () => {
    const abort = new AbortController();
    abort.abort();

    await sleep(0);
    await sleep(1000, abort.signal);

    expect(jest.getTimerCount()).toBe(0);
  });

  it("resolves early and clears its timer when aborted", async () => {
    const abort = new AbortController();
    const pending = sleep(10_000, abort.signal);

    abort.abort();
    await pending;

    expect(jest.getTimerCount()).toBe(0);
  });
});
