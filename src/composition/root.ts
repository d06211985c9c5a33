import type { PollRunSummary } from "../application/poll-loop/poll-loop.error-handler";
import { runPollLoop } from "../application/poll-loop/runPollLoop.usecase";
import { createJsonHttpClient } from "../connectors/json/createJsonHttpClient";
import { MongoOffsetStore } from "../infrastructure/mongo/MongoOffsetStore";
import { MongoRecordSink } from "../infrastructure/mongo/MongoRecordSink";
import type { ClientConfigs } from "../shared/config/client.configs";
import { type Env, loadEnv } from "../shared/config/env";
import { loadRuntimeConfigFromEnv, type RuntimeConfig } from "../shared/config/runtime.config";

export const toClientConfigs = (env: Env, runtime: Pick<RuntimeConfig, "timeoutMs" | "retries">): ClientConfigs => ({
  "http.serverUri": env.HTTP_SERVER_URI,
  "http.endpoint": env.HTTP_ENDPOINT,
  "http.method": env.HTTP_METHOD,
  "http.auth.type": env.HTTP_AUTH_TYPE,
  "http.auth.username": env.HTTP_AUTH_USERNAME,
  "http.auth.password": env.HTTP_AUTH_PASSWORD,
  "http.auth.domain": env.HTTP_AUTH_DOMAIN,
  "http.auth.workstation": env.HTTP_AUTH_WORKSTATION,
  "http.auth.preemptive": env.HTTP_AUTH_PREEMPTIVE,
  "http.response.itemsPath": env.HTTP_ITEMS_PATH,
  "http.offset.field": env.HTTP_OFFSET_FIELD,
  "http.offset.param": env.HTTP_OFFSET_PARAM,
  "http.request.limitParam": env.HTTP_LIMIT_PARAM,
  "http.timeoutMs": runtime.timeoutMs,
  "http.retries": runtime.retries
});

export const runPoller = async (signal?: AbortSignal): Promise<PollRunSummary> => {
  const env = loadEnv();
  const runtime = loadRuntimeConfigFromEnv();

  const client = createJsonHttpClient(toClientConfigs(env, runtime));
  const offsets = new MongoOffsetStore(env.MONGO_URI);
  const sink = new MongoRecordSink(env.MONGO_URI);

  try {
    return await runPollLoop({ client, offsets, sink, config: runtime.pollerConfig, signal });
  } finally {
    await client.close();
    await offsets.close();
    await sink.close();
  }
};
