import type { HttpResponse } from "../core/http/http.types";
import type { Offset, Partition, SourceRecord } from "../core/polling/polling.types";

/**
 * Turns a validated response into items. The only piece a connector must provide.
 */
export interface DataExtractor<T = unknown> {
  extract(partition: Partition, offset: Offset, response: HttpResponse): Promise<T[]> | T[];
}

export type OffsetUpdateContext<T = unknown> = {
  topic: string;
  partition: Partition;
  offset: Offset;
  response: HttpResponse;
  records: readonly SourceRecord<T>[];
};

/**
 * Computes the offset for the next poll. Returning `undefined` keeps the
 * current offset; any other value replaces it wholesale.
 */
export interface OffsetUpdater<T = unknown> {
  update(ctx: OffsetUpdateContext<T>): Promise<Offset | undefined> | Offset | undefined;
}
