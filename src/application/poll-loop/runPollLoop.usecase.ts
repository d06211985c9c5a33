import { APIClientError } from "../../core/errors/client.errors";
import type { Offset, Partition, PollResult } from "../../core/polling/polling.types";
import type { OffsetStore } from "../../ports/OffsetStore";
import type { RecordSink } from "../../ports/RecordSink";
import { createLimiter } from "../../shared/concurrency/limiter";
import type { HttpApiClient } from "../http-poll/HttpApiClient";
import {
  buildPollFailedLog,
  createPollRunSummaryTracker,
  tooManyFailures,
  wrapPersistenceFailure,
  type PollRunSummary
} from "./poll-loop.error-handler";
import { type PollerConfigInput, resolvePollerConfig } from "./poller.config";

export type PollableClient<T = unknown> = Pick<HttpApiClient<T>, "partitions" | "initialOffset" | "poll">;

type PartitionState = {
  partition: Partition;
  offset: Offset;
};

const waitForNextTick = (ms: number, signal?: AbortSignal): Promise<void> =>
  new Promise<void>((resolve) => {
    if (ms <= 0 || signal?.aborted) {
      resolve();
      return;
    }

    const done = () => {
      clearTimeout(timer);
      signal?.removeEventListener("abort", done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal?.addEventListener("abort", done, { once: true });
  });

/**
 * Drives a client the way an ingestion host would: loads offsets, polls every
 * partition each tick, delivers records and only then stores the new offset.
 * A failed poll leaves the partition's offset where it was, so the next tick
 * retries from the same position.
 */
export const runPollLoop = async <T>(deps: {
  client: PollableClient<T>;
  offsets: OffsetStore;
  sink: RecordSink;
  config: PollerConfigInput;
  signal?: AbortSignal;
}): Promise<PollRunSummary> => {
  const { client, offsets, sink, signal } = deps;
  const config = resolvePollerConfig(deps.config);
  const limit = createLimiter(config.concurrency);
  const tracker = createPollRunSummaryTracker();

  const states: PartitionState[] = [];
  for (const partition of client.partitions()) {
    const stored = await offsets.load(partition);
    states.push({ partition, offset: stored ?? client.initialOffset(partition) });
  }

  const pollPartition = async (state: PartitionState, tick: number): Promise<APIClientError | undefined> => {
    let result: PollResult<T>;
    try {
      result = await client.poll(config.topic, state.partition, state.offset, config.itemsToPoll, signal);
    } catch (err) {
      if (!(err instanceof APIClientError)) throw err;
      tracker.addFailure();
      // eslint-disable-next-line no-console
      console.warn(JSON.stringify(buildPollFailedLog(err, state.partition)));
      return err;
    }

    if (result.records.length > 0) {
      try {
        await sink.deliver(result.records);
      } catch (error) {
        throw wrapPersistenceFailure("delivery_failed", error, { partition: state.partition, tick });
      }
    }

    if (result.records.length > 0 || result.offset !== state.offset) {
      try {
        await offsets.save(state.partition, result.offset);
      } catch (error) {
        throw wrapPersistenceFailure("offset_save_failed", error, { partition: state.partition, tick });
      }
      state.offset = result.offset;
    }

    tracker.addPoll(result.records.length);
    return undefined;
  };

  let consecutiveFailures = 0;
  while (!signal?.aborted) {
    if (config.maxPolls != null && tracker.ticks() >= config.maxPolls) break;

    const tick = tracker.nextTickNumber();
    const failures = (await Promise.all(states.map((state) => limit(() => pollPartition(state, tick))))).filter(
      (failure): failure is APIClientError => failure != null
    );
    tracker.addTick();

    if (failures.length > 0) {
      consecutiveFailures += 1;
      if (consecutiveFailures >= config.maxConsecutiveFailures) {
        throw tooManyFailures(tick, consecutiveFailures, failures[failures.length - 1]);
      }
    } else {
      consecutiveFailures = 0;
    }

    if (config.maxPolls != null && tracker.ticks() >= config.maxPolls) break;
    await waitForNextTick(config.pollIntervalMs, signal);
  }

  const summary = tracker.summary();
  // eslint-disable-next-line no-console
  console.log(JSON.stringify({ event: "poll.completed", topic: config.topic, ...summary }));
  return summary;
};
