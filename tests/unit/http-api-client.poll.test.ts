import { HttpApiClient, type HttpApiClientStrategies } from "../../src/application/http-poll/HttpApiClient";
import { buildRequestWithParams } from "../../src/application/http-poll/request.builder";
import { APIClientError } from "../../src/core/errors/client.errors";
import type { HttpResponse } from "../../src/core/http/http.types";
import { SKIP_POLL, type Offset, type Partition } from "../../src/core/polling/polling.types";
import type { DataExtractor } from "../../src/ports/DataExtractor";
import { createFakeTransport, fakeResponse, type FakeResponse } from "../support/fake-http";
import { baseConfigs, itemsPartition } from "../support/fixtures";

type Item = { id: number };

const listExtractor = (items: Item[]): DataExtractor<Item> => ({
  extract: () => items
});

const setup = (
  respond: () => HttpResponse | Promise<HttpResponse>,
  strategies: Partial<HttpApiClientStrategies<Item>> = {}
) => {
  const fake = createFakeTransport(respond);
  const client = new HttpApiClient<Item>(baseConfigs, {
    extractor: listExtractor([]),
    ...strategies,
    createTransport: () => fake.transport
  });
  return { client, ...fake };
};

const captureError = async (promise: Promise<unknown>): Promise<APIClientError> => {
  try {
    await promise;
  } catch (err) {
    if (err instanceof APIClientError) return err;
    throw err;
  }
  throw new Error("expected poll to fail");
};

describe("HttpApiClient.poll", () => {
  beforeEach(() => {
    jest.spyOn(console, "debug").mockImplementation(() => undefined);
    jest.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("turns each extracted item into a record tagged with the partition url", async () => {
    const response = fakeResponse({ body: "[]", url: itemsPartition.url });
    const { client, requests } = setup(() => response, {
      extractor: listExtractor([{ id: 1 }, { id: 2 }])
    });
    const offset: Offset = {};

    const result = await client.poll("events", itemsPartition, offset, 100);

    expect(requests).toEqual([{ url: "http://api.example.com/items", method: "GET", headers: {} }]);
    expect(result.records).toHaveLength(2);
    expect(result.records.map((record) => record.value)).toEqual([{ id: 1 }, { id: 2 }]);
    for (const record of result.records) {
      expect(record.topic).toBe("events");
      expect(record.partition).toBe(itemsPartition);
      expect(record.offset).toBe(offset);
      expect(record.key).toBeNull();
      expect(record.headers).toEqual({ "http.source": "http://api.example.com/items" });
    }
    expect(result.offset).toBe(offset);
    expect(response.closeCalls()).toBe(1);
  });

  it("returns no records for an empty extraction and still closes the response", async () => {
    const response = fakeResponse({ body: "[]" });
    const { client } = setup(() => response);

    const result = await client.poll("events", itemsPartition, {}, 100);

    expect(result.records).toEqual([]);
    expect(response.closeCalls()).toBe(1);
  });

  it("fails with the status, body, partition and offset on a non-2xx response", async () => {
    const response = fakeResponse({ status: 500, statusText: "Internal Server Error", body: "boom", url: itemsPartition.url });
    const extract = jest.fn(() => [{ id: 1 }]);
    const { client } = setup(() => response, { extractor: { extract } });

    const err = await captureError(client.poll("events", itemsPartition, { page: 3 }, 100));

    expect(err.code).toBe("unexpected_status");
    expect(err.status).toBe(500);
    expect(err.body).toBe("boom");
    expect(err.message).toBe(
      [
        "Unexpected status: 500 Internal Server Error",
        "body: boom",
        'partition: {"url":"http://api.example.com/items","method":"GET","metadata":{}}',
        'offset: {"page":3}'
      ].join("\n\t")
    );
    expect(extract).not.toHaveBeenCalled();
    expect(response.closeCalls()).toBe(1);
    expect(console.error).toHaveBeenCalledWith(
      JSON.stringify({
        event: "http.unexpected_status",
        status: 500,
        statusText: "Internal Server Error",
        url: "http://api.example.com/items",
        body: "boom",
        partition: itemsPartition,
        offset: { page: 3 }
      })
    );
  });

  it("treats 3xx responses as failures", async () => {
    const { client } = setup(() => fakeResponse({ status: 304, statusText: "Not Modified" }));

    const err = await captureError(client.poll("events", itemsPartition, {}, 100));

    expect(err.code).toBe("unexpected_status");
    expect(err.status).toBe(304);
  });

  it("skips the HTTP call when the request builder returns SKIP_POLL", async () => {
    const { client, requests } = setup(() => fakeResponse(), {
      requestBuilder: { build: () => SKIP_POLL }
    });
    const offset: Offset = { cursor: 7 };

    const result = await client.poll("events", itemsPartition, offset, 100);

    expect(requests).toHaveLength(0);
    expect(result.records).toEqual([]);
    expect(result.offset).toBe(offset);
  });

  it("does not call the server once the stop signal is aborted", async () => {
    const { client, requests } = setup(() => fakeResponse());
    const controller = new AbortController();
    controller.abort();
    const offset: Offset = {};

    const result = await client.poll("events", itemsPartition, offset, 100, controller.signal);

    expect(requests).toHaveLength(0);
    expect(result).toEqual({ records: [], offset });
  });

  it("sends what a parameterised request builder produces", async () => {
    const { client, requests } = setup(() => fakeResponse(), {
      requestBuilder: {
        build: (ctx) => buildRequestWithParams(ctx, {}, { limit: String(ctx.itemsToPoll) })
      }
    });

    await client.poll("events", itemsPartition, {}, 25);

    expect(requests[0]?.url).toBe("http://api.example.com/items?limit=25");
  });

  it("calls the offset updater exactly once and returns its offset", async () => {
    const update = jest.fn(() => ({ cursor: 2 }));
    const { client } = setup(() => fakeResponse(), {
      extractor: listExtractor([{ id: 1 }, { id: 2 }]),
      offsetUpdater: { update }
    });
    const offset: Offset = { cursor: 0 };

    const result = await client.poll("events", itemsPartition, offset, 100);

    expect(update).toHaveBeenCalledTimes(1);
    expect(result.offset).toEqual({ cursor: 2 });
    expect(result.records.every((record) => record.offset === offset)).toBe(true);
    expect(offset).toEqual({ cursor: 0 });
  });

  it("wraps transport failures without a response to close", async () => {
    const { client } = setup(() => {
      throw new Error("connect ECONNREFUSED");
    });

    const err = await captureError(client.poll("events", itemsPartition, {}, 100));

    expect(err.code).toBe("transport_failed");
    expect(err.message).toBe("transport failed for http://api.example.com/items: connect ECONNREFUSED");
    expect(err.cause).toBeInstanceOf(Error);
  });

  it("wraps extractor failures and closes the response", async () => {
    const response: FakeResponse = fakeResponse({ body: "not json" });
    const { client } = setup(() => response, {
      extractor: {
        extract: () => {
          throw new SyntaxError("Unexpected token");
        }
      }
    });

    const err = await captureError(client.poll("events", itemsPartition, {}, 100));

    expect(err.code).toBe("extraction_failed");
    expect(err.message).toBe("extraction failed for http://api.example.com/items: Unexpected token");
    expect(response.closeCalls()).toBe(1);
  });

  it("passes APIClientError from strategies through unchanged", async () => {
    const original = new APIClientError({ code: "extraction_failed", message: "bad payload" });
    const { client } = setup(() => fakeResponse(), {
      extractor: {
        extract: async () => {
          throw original;
        }
      }
    });

    await expect(client.poll("events", itemsPartition, {}, 100)).rejects.toBe(original);
  });

  it("wraps offset updater failures", async () => {
    const response = fakeResponse();
    const { client } = setup(() => response, {
      offsetUpdater: {
        update: () => {
          throw new Error("no cursor");
        }
      }
    });

    const err = await captureError(client.poll("events", itemsPartition, {}, 100));

    expect(err.code).toBe("offset_update_failed");
    expect(response.closeCalls()).toBe(1);
  });

  it("keeps concurrent polls of different partitions apart on one transport", async () => {
    const ordersPartition: Partition = { url: "http://api.example.com/orders", method: "GET", metadata: {} };
    const responses = new Map<string, FakeResponse>();
    let releaseItems: () => void = () => undefined;
    const itemsHeld = new Promise<void>((resolve) => {
      releaseItems = resolve;
    });

    // The items response is extracted only after the orders request went out.
    const { transport, requests } = createFakeTransport(async (request) => {
      const response = fakeResponse({ url: request.url });
      responses.set(request.url, response);
      if (request.url === ordersPartition.url) releaseItems();
      return response;
    });
    const client = new HttpApiClient<Item>(baseConfigs, {
      extractor: {
        extract: async (partition, offset) => {
          if (partition.url === itemsPartition.url) await itemsHeld;
          return [{ id: Number(offset.cursor) }];
        }
      },
      createTransport: () => transport
    });

    const itemsOffset: Offset = { cursor: 1 };
    const ordersOffset: Offset = { cursor: 2 };
    const [items, orders] = await Promise.all([
      client.poll("events", itemsPartition, itemsOffset, 10),
      client.poll("events", ordersPartition, ordersOffset, 10)
    ]);

    expect(requests.map((request) => request.url)).toEqual([itemsPartition.url, ordersPartition.url]);
    expect(items.records).toHaveLength(1);
    expect(items.records[0]).toMatchObject({
      partition: itemsPartition,
      offset: itemsOffset,
      value: { id: 1 },
      headers: { "http.source": "http://api.example.com/items" }
    });
    expect(orders.records).toHaveLength(1);
    expect(orders.records[0]).toMatchObject({
      partition: ordersPartition,
      offset: ordersOffset,
      value: { id: 2 },
      headers: { "http.source": "http://api.example.com/orders" }
    });
    expect(responses.get(itemsPartition.url)?.closeCalls()).toBe(1);
    expect(responses.get(ordersPartition.url)?.closeCalls()).toBe(1);
  });

  it("wraps request builder failures before any HTTP call", async () => {
    const { client, requests } = setup(() => fakeResponse(), {
      requestBuilder: {
        build: () => {
          throw new TypeError("Invalid URL");
        }
      }
    });

    const err = await captureError(client.poll("events", itemsPartition, {}, 100));

    expect(err.code).toBe("request_build_failed");
    expect(err.message).toBe("request build failed for http://api.example.com/items: Invalid URL");
    expect(requests).toHaveLength(0);
  });
});
