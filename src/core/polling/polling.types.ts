import type { HttpMethod } from "../http/http.types";

/**
 * One logical polling target. Built once by the client and frozen; hosts use
 * it as the key under which offsets are stored.
 */
export type Partition = Readonly<{
  url: string;
  method: HttpMethod;
  metadata: Readonly<Record<string, string>>;
}>;

/**
 * Progress marker for a partition (cursor, timestamp, page token...).
 * Never mutated: a poll returns a new offset instead.
 */
export type Offset = Readonly<Record<string, unknown>>;

export const SOURCE_HEADER = "http.source";

export type SourceRecord<T = unknown> = Readonly<{
  topic: string;
  partition: Partition;
  offset: Offset;
  key: null;
  value: T;
  headers: Readonly<Record<typeof SOURCE_HEADER, string>>;
}>;

export type PollResult<T = unknown> = {
  records: SourceRecord<T>[];
  /** Offset the host should persist once the records are delivered. */
  offset: Offset;
};

/** Returned by a request builder when there is nothing to fetch this tick. */
export const SKIP_POLL: unique symbol = Symbol("http-poll.skip");
export type SkipPoll = typeof SKIP_POLL;

export const emptyOffset = (): Offset => Object.freeze({});

export const partitionKey = (partition: Partition): string => `${partition.method} ${partition.url}`;
