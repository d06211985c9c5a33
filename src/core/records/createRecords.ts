import { SOURCE_HEADER, type Offset, type Partition, type SourceRecord } from "../polling/polling.types";

/**
 * Wraps extracted items into records, one per item, keeping extraction order.
 * Records carry the offset the poll started from, not the updated one.
 */
export const createRecords = <T>(
  topic: string,
  partition: Partition,
  offset: Offset,
  items: readonly T[]
): SourceRecord<T>[] =>
  items.map((value) =>
    Object.freeze({
      topic,
      partition,
      offset,
      key: null,
      value,
      headers: Object.freeze({ [SOURCE_HEADER]: partition.url })
    })
  );
