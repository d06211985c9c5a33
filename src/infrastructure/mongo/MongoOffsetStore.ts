import { MongoClient, type Collection } from "mongodb";
import { partitionKey, type Offset, type Partition } from "../../core/polling/polling.types";
import type { OffsetStore } from "../../ports/OffsetStore";
import { mongoIndexes } from "./mongo.indexes";

export type OffsetDoc = {
  _id: string;
  partition: { url: string; method: string; metadata: Record<string, string> };
  offset: Record<string, unknown>;
  updatedAt: Date;
};

/**
 * One document per partition, replaced wholesale on every save.
 */
export class MongoOffsetStore implements OffsetStore {
  private client?: MongoClient;
  private collection?: Collection<OffsetDoc>;

  constructor(
    private readonly mongoUri: string,
    private readonly dbName = "http_poll",
    private readonly collectionName = "offsets"
  ) {}

  private async getCollection(): Promise<Collection<OffsetDoc>> {
    if (this.collection) return this.collection;

    this.client = new MongoClient(this.mongoUri);
    await this.client.connect();

    const col = this.client.db(this.dbName).collection<OffsetDoc>(this.collectionName);
    for (const idx of mongoIndexes.offsetCollection) {
      await col.createIndex(idx.keys, idx.options);
    }

    this.collection = col;
    return col;
  }

  async load(partition: Partition): Promise<Offset | undefined> {
    const col = await this.getCollection();
    const doc = await col.findOne({ _id: partitionKey(partition) });
    return doc ? Object.freeze({ ...doc.offset }) : undefined;
  }

  async save(partition: Partition, offset: Offset): Promise<void> {
    const col = await this.getCollection();
    await col.updateOne(
      { _id: partitionKey(partition) },
      {
        $set: {
          partition: { url: partition.url, method: partition.method, metadata: { ...partition.metadata } },
          offset: { ...offset },
          updatedAt: new Date()
        }
      },
      { upsert: true }
    );
  }

  async close(): Promise<void> {
    await this.client?.close();
    this.client = undefined;
    this.collection = undefined;
  }
}
