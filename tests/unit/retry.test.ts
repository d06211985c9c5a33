import { backoffDelay, withRetry } from "../../src/shared/retry/retry";

const noSleep = () => Promise.resolve();

describe("withRetry", () => {
  it("retries retryable errors until success", async () => {
    let attempts = 0;
    const delays: number[] = [];

    const result = await withRetry(async () => {
      attempts += 1;
      if (attempts <= 2) throw new Error("retry-me");
      return "ok";
    }, {
      retries: 3,
      minDelayMs: 5,
      maxDelayMs: 50,
      isRetryable: () => true,
      jitterRatio: 0,
      sleep: noSleep,
      onRetry: ({ delayMs }) => {
        delays.push(delayMs);
      }
    });

    expect(result).toBe("ok");
    expect(attempts).toBe(3);
    expect(delays).toEqual([5, 10]);
  });

  it("does not retry errors that are not retryable", async () => {
    let attempts = 0;
    const onGiveUp = jest.fn();

    await expect(withRetry(async () => {
      attempts += 1;
      throw new Error("fatal");
    }, {
      retries: 3,
      minDelayMs: 1,
      maxDelayMs: 10,
      isRetryable: () => false,
      sleep: noSleep,
      onGiveUp
    })).rejects.toThrow("fatal");

    expect(attempts).toBe(1);
    expect(onGiveUp).toHaveBeenCalledWith({ attempt: 1, maxAttempts: 4, error: expect.any(Error) });
  });

  it("gives up after the last retry", async () => {
    let attempts = 0;
    const onGiveUp = jest.fn();

    await expect(withRetry(async () => {
      attempts += 1;
      throw new Error(`failure ${attempts}`);
    }, {
      retries: 2,
      minDelayMs: 1,
      maxDelayMs: 10,
      isRetryable: () => true,
      sleep: noSleep,
      onGiveUp
    })).rejects.toThrow("failure 3");

    expect(onGiveUp).toHaveBeenCalledWith(expect.objectContaining({ attempt: 3, maxAttempts: 3 }));
  });
});

describe("backoffDelay", () => {
  it("doubles per attempt up to the maximum", () => {
    const policy = { minDelayMs: 100, maxDelayMs: 500, jitterRatio: 0 };
    expect([0, 1, 2, 3].map((attempt) => backoffDelay(attempt, policy))).toEqual([100, 200, 400, 500]);
  });

  it("adds bounded jitter", () => {
    expect(backoffDelay(1, { minDelayMs: 100, maxDelayMs: 1000, randomFn: () => 0.5 })).toBe(220);
    expect(backoffDelay(1, { minDelayMs: 100, maxDelayMs: 1000, randomFn: () => 7, jitterRatio: 3 })).toBe(400);
  });
});
