#!/usr/bin/env node
import { PollLoopAbortedError, type PollLoopErrorContext } from "../application/poll-loop/poll-loop.error-handler";
import { runPoller } from "../composition/root";
import { APIClientError, ConfigurationError } from "../core/errors/client.errors";

type CliErrorEnvelope = {
  event: "poll.aborted";
  name: string;
  message: string;
  code?: string;
  context?: PollLoopErrorContext | { url: string } | { key: string };
  status?: number;
  stack?: string;
};

export const isDebugMode = (env: NodeJS.ProcessEnv = process.env): boolean => {
  const debug = env.DEBUG?.toLowerCase();
  return debug === "1" || debug === "true";
};

/**
 * One JSON line for a fatal run. Causes, offsets and response bodies stay out;
 * the stack is added only in debug mode.
 */
export const buildCliErrorEnvelope = (err: unknown, includeStack: boolean): CliErrorEnvelope => {
  const error = err instanceof Error ? err : new Error(String(err));
  const envelope: CliErrorEnvelope = {
    event: "poll.aborted",
    name: error.name || "Error",
    message: error.message
  };

  if (err instanceof PollLoopAbortedError) {
    envelope.code = err.code;
    envelope.context = { ...err.context };
  } else if (err instanceof APIClientError) {
    envelope.code = err.code;
    const url = err.context.url ?? err.context.partition?.url;
    if (url != null) envelope.context = { url };
    if (err.status != null) envelope.status = err.status;
  } else if (err instanceof ConfigurationError && err.key != null) {
    envelope.context = { key: err.key };
  }

  if (includeStack && typeof error.stack === "string") {
    envelope.stack = error.stack;
  }

  return envelope;
};

export const executePollCli = async (): Promise<void> => {
  const controller = new AbortController();
  const stop = () => controller.abort();
  process.once("SIGINT", stop);
  process.once("SIGTERM", stop);

  try {
    await runPoller(controller.signal);
  } catch (err) {
    const envelope = buildCliErrorEnvelope(err, isDebugMode());
    // eslint-disable-next-line no-console
    console.error(JSON.stringify(envelope));
    process.exit(1);
  } finally {
    process.removeListener("SIGINT", stop);
    process.removeListener("SIGTERM", stop);
  }
};

if (require.main === module) {
  void executePollCli();
}
