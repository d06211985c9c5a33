import type { HttpRequest, HttpResponse } from "../core/http/http.types";

/**
 * Shared by every poll of a client, possibly concurrently across partitions.
 * Implementations own connection reuse, timeouts and socket-level retries.
 */
export interface HttpTransport {
  execute(request: HttpRequest): Promise<HttpResponse>;
  close(): Promise<void>;
}
