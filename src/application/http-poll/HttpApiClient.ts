import type { HttpRequest, HttpResponse } from "../../core/http/http.types";
import { UrlBuilder } from "../../core/http/url.builder";
import {
  emptyOffset,
  SKIP_POLL,
  type Offset,
  type Partition,
  type PollResult,
  type SkipPoll
} from "../../core/polling/polling.types";
import { createRecords } from "../../core/records/createRecords";
import { resolveAuthenticator, type AuthenticatorRegistry } from "../../infrastructure/auth/authenticator.resolver";
import { FetchHttpTransport, type FetchHttpTransportOptions } from "../../infrastructure/http/FetchHttpTransport";
import type { Authenticator } from "../../ports/Authenticator";
import type { DataExtractor, OffsetUpdater } from "../../ports/DataExtractor";
import type { HttpTransport } from "../../ports/HttpTransport";
import type { ClientConfigs } from "../../shared/config/client.configs";
import { type HttpClientConfig, resolveHttpClientConfig } from "./client.config";
import { unexpectedStatusError, wrapPollFailure } from "./poll.error-handler";
import { defaultRequestBuilder, type RequestBuilder } from "./request.builder";

export type TransportFactory = (options: Pick<FetchHttpTransportOptions, "authenticator" | "timeoutMs" | "retries">) => HttpTransport;

export type HttpApiClientStrategies<T> = {
  extractor: DataExtractor<T>;
  offsetUpdater?: OffsetUpdater<T>;
  requestBuilder?: RequestBuilder;
  createTransport?: TransportFactory;
  authenticators?: AuthenticatorRegistry;
};

export const noopOffsetUpdater: OffsetUpdater = {
  update: () => undefined
};

/**
 * Polls one HTTP endpoint and turns each successful response into records.
 *
 * Configuration (server, endpoint, auth, transport settings) is read and
 * validated once in the constructor; a `ConfigurationError` means the client
 * must not be started. `poll` either returns all records of a response or
 * throws `APIClientError`, never a partial result.
 */
export class HttpApiClient<T = unknown> {
  readonly config: HttpClientConfig;
  private readonly authenticator: Authenticator;
  private readonly transport: HttpTransport;
  private readonly extractor: DataExtractor<T>;
  private readonly offsetUpdater: OffsetUpdater<T>;
  private readonly requestBuilder: RequestBuilder;
  private closed = false;

  constructor(configs: ClientConfigs, strategies: HttpApiClientStrategies<T>) {
    this.config = resolveHttpClientConfig(configs);
    this.authenticator = resolveAuthenticator(configs, strategies.authenticators);

    const createTransport: TransportFactory = strategies.createTransport ?? ((options) => new FetchHttpTransport(options));
    this.transport = createTransport({
      authenticator: this.authenticator,
      timeoutMs: this.config.timeoutMs,
      retries: this.config.retries
    });

    this.extractor = strategies.extractor;
    this.offsetUpdater = strategies.offsetUpdater ?? noopOffsetUpdater;
    this.requestBuilder = strategies.requestBuilder ?? defaultRequestBuilder;
  }

  get authType(): string {
    return this.authenticator.type;
  }

  partitions(): Partition[] {
    let url: string;
    try {
      url = new UrlBuilder(this.config.serverUri + this.config.endpoint).getUrl();
    } catch (err) {
      throw wrapPollFailure("invalid_url", err, { url: this.config.serverUri + this.config.endpoint });
    }

    return [Object.freeze({ url, method: this.config.method, metadata: Object.freeze({}) })];
  }

  initialOffset(_partition: Partition): Offset {
    return emptyOffset();
  }

  async poll(
    topic: string,
    partition: Partition,
    offset: Offset,
    itemsToPoll: number,
    signal?: AbortSignal
  ): Promise<PollResult<T>> {
    if (signal?.aborted) {
      return { records: [], offset };
    }

    let request: HttpRequest | SkipPoll;
    try {
      request = await this.requestBuilder.build({ partition, offset, itemsToPoll, signal });
    } catch (err) {
      throw wrapPollFailure("request_build_failed", err, { partition, offset });
    }

    if (request === SKIP_POLL) {
      // eslint-disable-next-line no-console
      console.debug(JSON.stringify({ event: "poll.skipped", url: partition.url }));
      return { records: [], offset };
    }

    let response: HttpResponse;
    try {
      response = await this.transport.execute(request);
    } catch (err) {
      throw wrapPollFailure("transport_failed", err, { partition, offset, url: request.url });
    }

    try {
      const data = await this.processResponse(partition, offset, response);
      const records = createRecords(topic, partition, offset, data);

      let next: Offset | undefined;
      try {
        next = await this.offsetUpdater.update({ topic, partition, offset, response, records });
      } catch (err) {
        throw wrapPollFailure("offset_update_failed", err, { partition, offset, url: request.url });
      }

      return { records, offset: next ?? offset };
    } finally {
      await response.close();
    }
  }

  /**
   * Fails on a non-2xx response (logging status, body, partition and offset),
   * otherwise hands the response to the extractor.
   */
  async processResponse(partition: Partition, offset: Offset, response: HttpResponse): Promise<T[]> {
    if (!response.ok) {
      let body: string;
      try {
        body = await response.text();
      } catch (err) {
        body = `<unreadable body: ${err instanceof Error ? err.message : String(err)}>`;
      }

      // eslint-disable-next-line no-console
      console.error(JSON.stringify({
        event: "http.unexpected_status",
        status: response.status,
        statusText: response.statusText,
        url: response.url || partition.url,
        body,
        partition,
        offset
      }));
      throw unexpectedStatusError({ response, body, partition, offset });
    }

    // eslint-disable-next-line no-console
    console.debug(JSON.stringify({ event: "http.request_succeeded", url: response.url || partition.url, status: response.status }));

    try {
      return await this.extractor.extract(partition, offset, response);
    } catch (err) {
      throw wrapPollFailure("extraction_failed", err, { partition, offset });
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.transport.close();
  }
}
