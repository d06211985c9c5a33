import type { HttpRequest } from "../core/http/http.types";
import type { ClientConfigs } from "../shared/config/client.configs";

export type AuthChallenge = {
  status: number;
  headers: Headers;
  /** 1 for the first challenge on this request, 2 for the next, ... */
  round: number;
};

/**
 * Request-signing capability resolved once per client and applied by the
 * transport to every outgoing request.
 */
export interface Authenticator {
  readonly type: string;
  /** Optional hook applied before the first attempt. */
  prepare?(request: HttpRequest): HttpRequest;
  /**
   * Answers a 401 challenge with the request to send next, or `null` to give
   * up and hand the 401 back to the caller.
   */
  authenticate(request: HttpRequest, challenge: AuthChallenge): Promise<HttpRequest | null> | HttpRequest | null;
}

export type AuthenticatorFactory = (configs: ClientConfigs) => Authenticator;
