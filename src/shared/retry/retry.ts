export type RetryAttempt = {
  attempt: number;
  maxAttempts: number;
  error: unknown;
};

export type RetryPolicy = {
  retries: number;          // extra attempts after the first one (2 means up to 3 tries)
  minDelayMs: number;
  maxDelayMs: number;
  isRetryable: (err: unknown) => boolean;
  onRetry?: (ctx: RetryAttempt & { delayMs: number }) => void;
  onGiveUp?: (ctx: RetryAttempt) => void;
  randomFn?: () => number;
  jitterRatio?: number;
  sleep?: (ms: number) => Promise<void>;
};

const defaultSleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

export const backoffDelay = (
  attempt: number,
  policy: Pick<RetryPolicy, "minDelayMs" | "maxDelayMs" | "randomFn" | "jitterRatio">
): number => {
  const { minDelayMs, maxDelayMs, randomFn = Math.random, jitterRatio = 0.2 } = policy;
  const base = Math.min(maxDelayMs, minDelayMs * Math.pow(2, attempt));
  const ratio = Math.min(1, Math.max(0, jitterRatio));
  const random = Math.min(1, Math.max(0, randomFn()));
  return base + Math.floor(base * ratio * random);
};

export const withRetry = async <T>(fn: () => Promise<T>, policy: RetryPolicy): Promise<T> => {
  const { retries, isRetryable, onRetry, onGiveUp, sleep = defaultSleep } = policy;
  const maxAttempts = retries + 1;

  for (let attempt = 0; ; attempt += 1) {
    try {
      return await fn();
    } catch (err) {
      if (attempt >= retries || !isRetryable(err)) {
        onGiveUp?.({ attempt: attempt + 1, maxAttempts, error: err });
        throw err;
      }

      const delayMs = backoffDelay(attempt, policy);
      onRetry?.({ attempt: attempt + 1, maxAttempts, delayMs, error: err });
      await sleep(delayMs);
    }
  }
};
