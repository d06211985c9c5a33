import { randomUUID } from "crypto";
import { MongoClient, type Collection } from "mongodb";
import { partitionKey, SOURCE_HEADER, type SourceRecord } from "../../core/polling/polling.types";
import type { RecordSink } from "../../ports/RecordSink";
import { mongoIndexes } from "./mongo.indexes";

export type RecordDoc = {
  _id: string;
  topic: string;
  partitionKey: string;
  source: string;
  offset: Record<string, unknown>;
  value: unknown;
  polledAt: Date;
};

export const toRecordDoc = (record: SourceRecord, polledAt: Date): RecordDoc => ({
  _id: randomUUID(),
  topic: record.topic,
  partitionKey: partitionKey(record.partition),
  source: record.headers[SOURCE_HEADER],
  offset: { ...record.offset },
  value: record.value,
  polledAt
});

/**
 * Appends delivered records to a collection (at-least-once: a replayed poll
 * inserts its records again).
 */
export class MongoRecordSink implements RecordSink {
  private client?: MongoClient;
  private collection?: Collection<RecordDoc>;

  constructor(
    private readonly mongoUri: string,
    private readonly dbName = "http_poll",
    private readonly collectionName = "records"
  ) {}

  private async getCollection(): Promise<Collection<RecordDoc>> {
    if (this.collection) return this.collection;

    this.client = new MongoClient(this.mongoUri);
    await this.client.connect();

    const col = this.client.db(this.dbName).collection<RecordDoc>(this.collectionName);
    for (const idx of mongoIndexes.recordCollection) {
      await col.createIndex(idx.keys, idx.options);
    }

    this.collection = col;
    return col;
  }

  async deliver(records: readonly SourceRecord[]): Promise<{ delivered: number }> {
    if (records.length === 0) {
      return { delivered: 0 };
    }

    const polledAt = new Date();
    const col = await this.getCollection();
    const res = await col.insertMany(records.map((record) => toRecordDoc(record, polledAt)), { ordered: false });
    return { delivered: res.insertedCount ?? 0 };
  }

  async close(): Promise<void> {
    await this.client?.close();
    this.client = undefined;
    this.collection = undefined;
  }
}
