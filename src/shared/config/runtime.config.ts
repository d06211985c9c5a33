import { defaultHttpClientConfig, httpClientCaps } from "../../application/http-poll/client.config";
import { type PollerConfig, pollerCaps, resolvePollerConfig } from "../../application/poll-loop/poller.config";

// Same bounds the client applies to http.timeoutMs / http.retries.
export const runtimeCaps = httpClientCaps;

export type RuntimeConfig = {
  pollerConfig: PollerConfig;
  timeoutMs: number;
  retries: number;
};

const parseOptionalIntInRange = (
  env: NodeJS.ProcessEnv,
  name: string,
  range: { min: number; max: number }
): number | undefined => {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return undefined;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new Error(`${name}=${raw} is out of allowed range [${range.min}..${range.max}]`);
  }

  return value;
};

export const loadRuntimeConfigFromEnv = (env: NodeJS.ProcessEnv = process.env): RuntimeConfig => {
  const topic = env.POLL_TOPIC?.trim();
  if (!topic) {
    throw new Error("POLL_TOPIC is required");
  }

  const pollerConfig = resolvePollerConfig({
    topic,
    itemsToPoll: parseOptionalIntInRange(env, "POLL_ITEMS", pollerCaps.itemsToPoll),
    pollIntervalMs: parseOptionalIntInRange(env, "POLL_INTERVAL_MS", pollerCaps.pollIntervalMs),
    maxPolls: parseOptionalIntInRange(env, "POLL_MAX_POLLS", pollerCaps.maxPolls),
    concurrency: parseOptionalIntInRange(env, "POLL_CONCURRENCY", pollerCaps.concurrency),
    maxConsecutiveFailures: parseOptionalIntInRange(env, "POLL_MAX_CONSECUTIVE_FAILURES", pollerCaps.maxConsecutiveFailures)
  });

  const timeoutMs = parseOptionalIntInRange(env, "HTTP_TIMEOUT_MS", runtimeCaps.timeoutMs) ?? defaultHttpClientConfig.timeoutMs;
  const retries = parseOptionalIntInRange(env, "HTTP_RETRIES", runtimeCaps.retries) ?? defaultHttpClientConfig.retries;

  return { pollerConfig, timeoutMs, retries };
};
