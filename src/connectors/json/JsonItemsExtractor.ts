import { APIClientError } from "../../core/errors/client.errors";
import type { HttpResponse } from "../../core/http/http.types";
import type { Offset, Partition } from "../../core/polling/polling.types";
import type { DataExtractor } from "../../ports/DataExtractor";

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Reads the response as JSON and returns the array found at `itemsPath`
 * (the body itself when the path is empty).
 */
export class JsonItemsExtractor implements DataExtractor<unknown> {
  constructor(private readonly itemsPath: readonly string[] = []) {}

  async extract(partition: Partition, offset: Offset, response: HttpResponse): Promise<unknown[]> {
    let body: unknown;
    try {
      body = await response.json();
    } catch (err) {
      throw new APIClientError({
        code: "extraction_failed",
        message: `Response from ${partition.url} is not valid JSON`,
        context: { partition, offset },
        cause: err
      });
    }

    let items: unknown = body;
    for (const segment of this.itemsPath) {
      items = isRecord(items) ? items[segment] : undefined;
    }

    if (!Array.isArray(items)) {
      const where = this.itemsPath.length > 0 ? `"${this.itemsPath.join(".")}"` : "the response root";
      throw new APIClientError({
        code: "extraction_failed",
        message: `Expected an array at ${where} in response from ${partition.url}`,
        context: { partition, offset }
      });
    }
    return items;
  }
}
