import type { SourceRecord } from "../core/polling/polling.types";

export interface RecordSink {
  deliver(records: readonly SourceRecord[]): Promise<{ delivered: number }>;
}
