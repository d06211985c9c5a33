import type { HttpRequest, HttpResponse } from "../../core/http/http.types";
import type { Authenticator } from "../../ports/Authenticator";
import type { HttpTransport } from "../../ports/HttpTransport";
import { type RetryPolicy, withRetry } from "../../shared/retry/retry";

export class HttpTransportError extends Error {
  readonly isTimeout: boolean;
  readonly requestUrl: string;
  readonly cause?: unknown;

  constructor(message: string, opts: { isTimeout: boolean; requestUrl: string; cause?: unknown }) {
    super(message);
    this.name = "HttpTransportError";
    this.isTimeout = opts.isTimeout;
    this.requestUrl = opts.requestUrl;
    this.cause = opts.cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export type FetchHttpTransportOptions = {
  authenticator: Authenticator;
  timeoutMs: number;
  retries: number;
  maxAuthRounds?: number;
  fetchFn?: typeof fetch;
  backoff?: Partial<Pick<RetryPolicy, "minDelayMs" | "maxDelayMs" | "jitterRatio" | "sleep">>;
};

const safeUrl = (raw: string): string => {
  try {
    const url = new URL(raw);
    return `${url.origin}${url.pathname}${url.search}`;
  } catch {
    return raw;
  }
};

class FetchHttpResponse implements HttpResponse {
  private bodyText?: Promise<string>;
  private closed = false;

  constructor(private readonly res: Response) {}

  get status(): number {
    return this.res.status;
  }

  get statusText(): string {
    return this.res.statusText;
  }

  get ok(): boolean {
    return this.res.ok;
  }

  get url(): string {
    return this.res.url;
  }

  get headers(): Headers {
    return this.res.headers;
  }

  text(): Promise<string> {
    this.bodyText ??= this.res.text();
    return this.bodyText;
  }

  async json(): Promise<unknown> {
    const parsed: unknown = JSON.parse(await this.text());
    return parsed;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    if (this.bodyText != null || this.res.bodyUsed || this.res.body == null) return;

    await this.res.body.cancel().catch((err: unknown) => {
      // eslint-disable-next-line no-console
      console.warn(JSON.stringify({
        event: "http.close_failed",
        url: safeUrl(this.res.url),
        message: err instanceof Error ? err.message : String(err)
      }));
    });
  }
}

/**
 * HTTP transport on top of the global fetch (Node 20).
 * Network failures and timeouts are retried with backoff; HTTP statuses are
 * returned as-is. 401 challenges are answered by the configured authenticator.
 */
export class FetchHttpTransport implements HttpTransport {
  private readonly authenticator: Authenticator;
  private readonly timeoutMs: number;
  private readonly retries: number;
  private readonly maxAuthRounds: number;
  private readonly fetchFn: typeof fetch;
  private readonly backoff: FetchHttpTransportOptions["backoff"];
  private closed = false;

  constructor(options: FetchHttpTransportOptions) {
    this.authenticator = options.authenticator;
    this.timeoutMs = options.timeoutMs;
    this.retries = options.retries;
    this.maxAuthRounds = options.maxAuthRounds ?? 3;
    this.fetchFn = options.fetchFn ?? fetch;
    this.backoff = options.backoff;
  }

  async execute(request: HttpRequest): Promise<HttpResponse> {
    if (this.closed) {
      throw new HttpTransportError("HTTP transport is closed", { isTimeout: false, requestUrl: safeUrl(request.url) });
    }

    let current = this.authenticator.prepare?.(request) ?? request;
    let response = await this.send(current);

    for (let round = 1; response.status === 401 && round <= this.maxAuthRounds; round += 1) {
      let next: HttpRequest | null;
      try {
        next = await this.authenticator.authenticate(current, {
          status: response.status,
          headers: response.headers,
          round
        });
      } catch (err) {
        await response.close();
        throw err;
      }
      if (next == null) break;

      await response.close();
      current = next;
      response = await this.send(current);
    }

    return response;
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private send(request: HttpRequest): Promise<HttpResponse> {
    const requestUrl = safeUrl(request.url);
    const fetchFn = this.fetchFn;

    const doFetch = async (): Promise<HttpResponse> => {
      const controller = new AbortController();
      const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
      try {
        const res = await fetchFn(request.url, {
          method: request.method,
          headers: { ...request.headers },
          body: request.body,
          signal: controller.signal
        });
        return new FetchHttpResponse(res);
      } catch (err) {
        if (controller.signal.aborted) {
          throw new HttpTransportError(`HTTP request timeout after ${this.timeoutMs}ms`, {
            isTimeout: true,
            requestUrl,
            cause: err
          });
        }
        const reason = err instanceof Error ? err.message : String(err);
        throw new HttpTransportError(`HTTP request failed: ${reason}`, { isTimeout: false, requestUrl, cause: err });
      } finally {
        clearTimeout(timeout);
      }
    };

    return withRetry(doFetch, {
      retries: this.retries,
      minDelayMs: this.backoff?.minDelayMs ?? 250,
      maxDelayMs: this.backoff?.maxDelayMs ?? 5000,
      jitterRatio: this.backoff?.jitterRatio,
      sleep: this.backoff?.sleep,
      isRetryable: (err) => err instanceof HttpTransportError,
      onRetry: ({ attempt, maxAttempts, error }) => {
        // eslint-disable-next-line no-console
        console.warn(JSON.stringify({
          event: "http.retry",
          url: requestUrl,
          timeout: error instanceof HttpTransportError && error.isTimeout,
          attempt,
          maxAttempts
        }));
      },
      onGiveUp: ({ attempt, maxAttempts, error }) => {
        // eslint-disable-next-line no-console
        console.warn(JSON.stringify({
          event: "http.give_up",
          url: requestUrl,
          timeout: error instanceof HttpTransportError && error.isTimeout,
          attempt,
          maxAttempts
        }));
      }
    });
  }
}
