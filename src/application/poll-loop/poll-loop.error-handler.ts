import type { APIClientError } from "../../core/errors/client.errors";
import { partitionKey, type Partition } from "../../core/polling/polling.types";

export type PollLoopFailureCode = "too_many_failures" | "delivery_failed" | "offset_save_failed";

export type PollLoopErrorContext = {
  partition?: string;
  tick: number;
  consecutiveFailures?: number;
};

const toErrorMessage = (reason: unknown): string => {
  if (reason instanceof Error) return reason.message;
  return String(reason);
};

export class PollLoopAbortedError extends Error {
  readonly code: PollLoopFailureCode;
  readonly context: PollLoopErrorContext;
  readonly cause?: unknown;

  constructor(args: { code: PollLoopFailureCode; message: string; context: PollLoopErrorContext; cause?: unknown }) {
    super(args.message);
    this.name = "PollLoopAbortedError";
    this.code = args.code;
    this.context = args.context;
    this.cause = args.cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export const wrapPersistenceFailure = (
  code: Extract<PollLoopFailureCode, "delivery_failed" | "offset_save_failed">,
  reason: unknown,
  context: { partition: Partition; tick: number }
): PollLoopAbortedError => {
  const key = partitionKey(context.partition);
  const what = code === "delivery_failed" ? "Record delivery" : "Offset save";
  return new PollLoopAbortedError({
    code,
    message: `${what} failed for ${key} at tick=${context.tick}: ${toErrorMessage(reason)}`,
    context: { partition: key, tick: context.tick },
    cause: reason
  });
};

export const tooManyFailures = (tick: number, consecutiveFailures: number, last?: APIClientError) =>
  new PollLoopAbortedError({
    code: "too_many_failures",
    message: `Giving up after ${consecutiveFailures} consecutive failed ticks${last ? `: ${last.message}` : ""}`,
    context: { tick, consecutiveFailures },
    cause: last
  });

export type PollFailedLog = {
  event: "poll.failed";
  partition: string;
  code: string;
  message: string;
  status?: number;
};

export const buildPollFailedLog = (err: APIClientError, partition: Partition): PollFailedLog => {
  const log: PollFailedLog = {
    event: "poll.failed",
    partition: partitionKey(partition),
    code: err.code,
    message: err.message
  };
  if (err.status != null) log.status = err.status;
  return log;
};

export type PollRunSummary = {
  ticks: number;
  polls: number;
  records: number;
  emptyPolls: number;
  failures: number;
};

export const createPollRunSummaryTracker = () => {
  let ticks = 0;
  let polls = 0;
  let records = 0;
  let emptyPolls = 0;
  let failures = 0;

  return {
    ticks: () => ticks,
    nextTickNumber: () => ticks + 1,
    addTick: () => {
      ticks += 1;
    },
    addPoll: (recordCount: number) => {
      polls += 1;
      records += recordCount;
      if (recordCount === 0) emptyPolls += 1;
    },
    addFailure: () => {
      polls += 1;
      failures += 1;
    },
    summary: (): PollRunSummary => ({ ticks, polls, records, emptyPolls, failures })
  };
};
