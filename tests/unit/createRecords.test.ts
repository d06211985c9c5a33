import { createRecords } from "../../src/core/records/createRecords";
import { itemsPartition } from "../support/fixtures";

describe("createRecords", () => {
  it("creates one record per item in extraction order", () => {
    const offset = { cursor: 7 };
    const items = [{ id: 1 }, { id: 2 }, { id: 3 }];

    const records = createRecords("items-topic", itemsPartition, offset, items);

    expect(records).toHaveLength(3);
    records.forEach((record, index) => {
      expect(record.value).toBe(items[index]);
      expect(record.headers["http.source"]).toBe("http://api.example.com/items");
      expect(record.topic).toBe("items-topic");
      expect(record.key).toBeNull();
      expect(record.partition).toBe(itemsPartition);
      expect(record.offset).toBe(offset);
    });
  });

  it("returns an empty list for no items", () => {
    expect(createRecords("items-topic", itemsPartition, {}, [])).toEqual([]);
  });

  it("freezes records and their headers", () => {
    const [record] = createRecords("items-topic", itemsPartition, {}, ["a"]);
    expect(Object.isFrozen(record)).toBe(true);
    expect(Object.isFrozen(record?.headers)).toBe(true);
  });
});
