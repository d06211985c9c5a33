import type { HttpRequest } from "../../core/http/http.types";
import type { Offset } from "../../core/polling/polling.types";
import { buildRequestWithParams, type RequestBuilder, type RequestContext } from "../../application/http-poll/request.builder";
import type { OffsetUpdateContext, OffsetUpdater } from "../../ports/DataExtractor";

export const CURSOR_KEY = "cursor";

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const readCursor = (source: unknown, field: string): string | number | undefined => {
  if (!isRecord(source)) return undefined;
  const value = source[field];
  if (typeof value === "string" && value !== "") return value;
  if (typeof value === "number" && Number.isFinite(value)) return value;
  return undefined;
};

/**
 * Remembers `field` of the last record as the cursor. Pages without records
 * (or without the field) keep the previous offset.
 */
export class CursorOffsetUpdater implements OffsetUpdater<unknown> {
  constructor(private readonly field: string) {}

  update({ records }: OffsetUpdateContext<unknown>): Offset | undefined {
    const last = records[records.length - 1];
    if (last == null) return undefined;

    const cursor = readCursor(last.value, this.field);
    return cursor == null ? undefined : Object.freeze({ [CURSOR_KEY]: cursor });
  }
}

export class CursorRequestBuilder implements RequestBuilder {
  constructor(private readonly params: { offsetParam?: string; limitParam?: string }) {}

  build(ctx: RequestContext): HttpRequest {
    const query: Record<string, string> = {};

    const cursor = readCursor(ctx.offset, CURSOR_KEY);
    if (this.params.offsetParam && cursor != null) query[this.params.offsetParam] = String(cursor);
    if (this.params.limitParam) query[this.params.limitParam] = String(ctx.itemsToPoll);

    return buildRequestWithParams(ctx, {}, query);
  }
}
