import { APIClientError, type ApiClientErrorCode, type ApiClientErrorContext } from "../../core/errors/client.errors";
import type { HttpResponse } from "../../core/http/http.types";
import type { Offset, Partition } from "../../core/polling/polling.types";

export const maxBodySnippetLength = 2048;

const toErrorMessage = (reason: unknown): string => {
  if (reason instanceof Error) return reason.message;
  return String(reason);
};

export const bodySnippet = (body: string): string =>
  body.length > maxBodySnippetLength ? `${body.slice(0, maxBodySnippetLength)}...` : body;

/**
 * Wraps any failure inside a poll step. Errors that are already
 * `APIClientError` pass through untouched.
 */
export const wrapPollFailure = (
  code: ApiClientErrorCode,
  reason: unknown,
  context: ApiClientErrorContext
): APIClientError => {
  if (reason instanceof APIClientError) return reason;

  const where = context.url ?? context.partition?.url ?? "unknown url";
  return new APIClientError({
    code,
    message: `${code.replace(/_/g, " ")} for ${where}: ${toErrorMessage(reason)}`,
    context,
    cause: reason
  });
};

export const unexpectedStatusError = (args: {
  response: HttpResponse;
  body: string;
  partition: Partition;
  offset: Offset;
}): APIClientError => {
  const { response, body, partition, offset } = args;
  const snippet = bodySnippet(body);
  const message = [
    `Unexpected status: ${response.status} ${response.statusText}`.trimEnd(),
    `body: ${snippet}`,
    `partition: ${JSON.stringify(partition)}`,
    `offset: ${JSON.stringify(offset)}`
  ].join("\n\t");

  return new APIClientError({
    code: "unexpected_status",
    message,
    context: { partition, offset, url: response.url || partition.url },
    status: response.status,
    body: snippet
  });
};
