export type PollerConfig = {
  topic: string;
  itemsToPoll: number;
  pollIntervalMs: number;
  maxPolls?: number;
  concurrency: number;
  maxConsecutiveFailures: number;
};

export type PollerConfigInput = Partial<PollerConfig> & Pick<PollerConfig, "topic">;

export const defaultPollerConfig: Omit<PollerConfig, "topic"> = {
  itemsToPoll: 100,
  pollIntervalMs: 5000,
  concurrency: 1,
  maxConsecutiveFailures: 5
};

export const pollerCaps = {
  itemsToPoll: { min: 1, max: 10000 },
  pollIntervalMs: { min: 0, max: 3600000 },
  maxPolls: { min: 1, max: 1000000000 },
  concurrency: { min: 1, max: 50 },
  maxConsecutiveFailures: { min: 1, max: 1000 }
} as const;

const assertIntegerInRange = (name: string, value: number, min: number, max: number) => {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(`${name}=${String(value)} is out of allowed range [${min}..${max}]`);
  }
};

export const validatePollerConfig = (config: PollerConfig): PollerConfig => {
  if (config.topic.trim() === "") {
    throw new Error("topic must be a non-empty string");
  }
  assertIntegerInRange("itemsToPoll", config.itemsToPoll, pollerCaps.itemsToPoll.min, pollerCaps.itemsToPoll.max);
  assertIntegerInRange("pollIntervalMs", config.pollIntervalMs, pollerCaps.pollIntervalMs.min, pollerCaps.pollIntervalMs.max);
  if (config.maxPolls != null) {
    assertIntegerInRange("maxPolls", config.maxPolls, pollerCaps.maxPolls.min, pollerCaps.maxPolls.max);
  }
  assertIntegerInRange("concurrency", config.concurrency, pollerCaps.concurrency.min, pollerCaps.concurrency.max);
  assertIntegerInRange(
    "maxConsecutiveFailures",
    config.maxConsecutiveFailures,
    pollerCaps.maxConsecutiveFailures.min,
    pollerCaps.maxConsecutiveFailures.max
  );
  return config;
};

export const resolvePollerConfig = (input: PollerConfigInput): PollerConfig =>
  validatePollerConfig({
    topic: input.topic.trim(),
    itemsToPoll: input.itemsToPoll ?? defaultPollerConfig.itemsToPoll,
    pollIntervalMs: input.pollIntervalMs ?? defaultPollerConfig.pollIntervalMs,
    maxPolls: input.maxPolls,
    concurrency: input.concurrency ?? defaultPollerConfig.concurrency,
    maxConsecutiveFailures: input.maxConsecutiveFailures ?? defaultPollerConfig.maxConsecutiveFailures
  });
