import type { Offset, Partition } from "../core/polling/polling.types";

export interface OffsetStore {
  load(partition: Partition): Promise<Offset | undefined>;
  save(partition: Partition, offset: Offset): Promise<void>;
}
