import type { CreateIndexesOptions } from "mongodb";

type IndexPlan = {
  keys: Record<string, 1 | -1>;
  options?: CreateIndexesOptions;
};

/**
 * Index plan, applied (idempotently) the first time a collection is used:
 * - offsets are looked up by `_id` (partition key); `updatedAt` helps spotting stale partitions
 * - records are read back by topic/time and by source URL
 */
export const mongoIndexes: { offsetCollection: IndexPlan[]; recordCollection: IndexPlan[] } = {
  offsetCollection: [
    { keys: { updatedAt: 1 } }
  ],
  recordCollection: [
    { keys: { topic: 1, polledAt: 1 } },
    { keys: { source: 1 } }
  ]
};
