export { HttpApiClient, noopOffsetUpdater } from "./application/http-poll/HttpApiClient";
export type { HttpApiClientStrategies, TransportFactory } from "./application/http-poll/HttpApiClient";
export { clientConfigKeys, resolveHttpClientConfig } from "./application/http-poll/client.config";
export type { AuthType, HttpClientConfig } from "./application/http-poll/client.config";
export { buildRequestWithParams, defaultRequestBuilder } from "./application/http-poll/request.builder";
export type { RequestBuilder, RequestContext } from "./application/http-poll/request.builder";
export { runPollLoop } from "./application/poll-loop/runPollLoop.usecase";
export type { PollableClient } from "./application/poll-loop/runPollLoop.usecase";
export { PollLoopAbortedError } from "./application/poll-loop/poll-loop.error-handler";
export type { PollRunSummary } from "./application/poll-loop/poll-loop.error-handler";
export { createJsonHttpClient } from "./connectors/json/createJsonHttpClient";
export { APIClientError, ConfigurationError } from "./core/errors/client.errors";
export type { HttpMethod, HttpRequest, HttpResponse } from "./core/http/http.types";
export { UrlBuilder } from "./core/http/url.builder";
export { SKIP_POLL, SOURCE_HEADER, partitionKey } from "./core/polling/polling.types";
export type { Offset, Partition, PollResult, SourceRecord } from "./core/polling/polling.types";
export { createRecords } from "./core/records/createRecords";
export { resolveAuthenticator } from "./infrastructure/auth/authenticator.resolver";
export type { AuthenticatorRegistry } from "./infrastructure/auth/authenticator.resolver";
export { FetchHttpTransport } from "./infrastructure/http/FetchHttpTransport";
export { MongoOffsetStore } from "./infrastructure/mongo/MongoOffsetStore";
export { MongoRecordSink } from "./infrastructure/mongo/MongoRecordSink";
export type { AuthChallenge, Authenticator, AuthenticatorFactory } from "./ports/Authenticator";
export type { DataExtractor, OffsetUpdateContext, OffsetUpdater } from "./ports/DataExtractor";
export type { HttpTransport } from "./ports/HttpTransport";
export type { OffsetStore } from "./ports/OffsetStore";
export type { RecordSink } from "./ports/RecordSink";
