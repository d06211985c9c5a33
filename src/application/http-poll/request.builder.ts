import type { HttpRequest } from "../../core/http/http.types";
import { UrlBuilder } from "../../core/http/url.builder";
import type { Offset, Partition, SkipPoll } from "../../core/polling/polling.types";

export type RequestContext = {
  partition: Partition;
  offset: Offset;
  itemsToPoll: number;
  signal?: AbortSignal;
};

/**
 * Builds the request for one poll. Return `SKIP_POLL` to end the poll without
 * calling the server (not an error).
 */
export interface RequestBuilder {
  build(ctx: RequestContext): Promise<HttpRequest | SkipPoll> | HttpRequest | SkipPoll;
}

export const defaultRequestBuilder: RequestBuilder = {
  build: ({ partition }) => ({
    url: partition.url,
    method: partition.method,
    headers: {}
  })
};

/**
 * Same as the default request, with route params substituted into `{name}`
 * placeholders and query params appended.
 */
export const buildRequestWithParams = (
  ctx: RequestContext,
  routeParams: Readonly<Record<string, string>> = {},
  queryParams: Readonly<Record<string, string>> = {}
): HttpRequest => {
  const builder = new UrlBuilder(ctx.partition.url);
  for (const [name, value] of Object.entries(routeParams)) builder.routeParam(name, value);
  for (const [name, value] of Object.entries(queryParams)) builder.queryString(name, value);

  return {
    url: builder.getUrl(),
    method: ctx.partition.method,
    headers: {}
  };
};
