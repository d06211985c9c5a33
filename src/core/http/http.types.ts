export const httpMethods = ["GET", "POST", "PUT", "PATCH", "DELETE"] as const;

export type HttpMethod = (typeof httpMethods)[number];

export type HttpRequest = {
  url: string;
  method: HttpMethod;
  headers: Readonly<Record<string, string>>;
  body?: string;
};

/**
 * A completed HTTP exchange. The body can be read more than once (the first
 * read is cached) and must be released with `close()` when the caller is done.
 */
export interface HttpResponse {
  readonly status: number;
  readonly statusText: string;
  readonly ok: boolean;
  readonly url: string;
  readonly headers: Headers;
  text(): Promise<string>;
  json(): Promise<unknown>;
  close(): Promise<void>;
}

export const isHttpMethod = (value: string): value is HttpMethod =>
  httpMethods.some((method) => method === value);
