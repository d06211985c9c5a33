import type { Offset, Partition } from "../polling/polling.types";

export type ApiClientErrorCode =
  | "invalid_url"
  | "request_build_failed"
  | "transport_failed"
  | "unexpected_status"
  | "extraction_failed"
  | "offset_update_failed";

export type ApiClientErrorContext = {
  partition?: Partition;
  offset?: Offset;
  url?: string;
};

/**
 * Raised for invalid or missing configuration. Fatal at startup.
 */
export class ConfigurationError extends Error {
  readonly key?: string;
  readonly cause?: unknown;

  constructor(message: string, opts: { key?: string; cause?: unknown } = {}) {
    super(message);
    this.name = "ConfigurationError";
    this.key = opts.key;
    this.cause = opts.cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Raised when a poll cycle cannot complete. The poll is abandoned as a whole:
 * no records are returned and the caller's offset stays where it was.
 */
export class APIClientError extends Error {
  readonly code: ApiClientErrorCode;
  readonly context: ApiClientErrorContext;
  readonly status?: number;
  readonly body?: string;
  readonly cause?: unknown;

  constructor(args: {
    code: ApiClientErrorCode;
    message: string;
    context?: ApiClientErrorContext;
    status?: number;
    body?: string;
    cause?: unknown;
  }) {
    super(args.message);
    this.name = "APIClientError";
    this.code = args.code;
    this.context = args.context ?? {};
    this.status = args.status;
    this.body = args.body;
    this.cause = args.cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
