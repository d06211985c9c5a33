import type { HttpRequest } from "../../core/http/http.types";
import type { Authenticator } from "../../ports/Authenticator";
import { type ClientConfigs, readBoolean, readRequiredString } from "../../shared/config/client.configs";
import { authorizationOf, withAuthorization } from "./auth.headers";

export const authConfigKeys = {
  username: "http.auth.username",
  password: "http.auth.password",
  domain: "http.auth.domain",
  workstation: "http.auth.workstation",
  preemptive: "http.auth.preemptive"
} as const;

export class BasicAuthenticator implements Authenticator {
  readonly type = "basic";
  private readonly credential: string;
  private readonly preemptive: boolean;

  constructor(configs: ClientConfigs) {
    const username = readRequiredString(configs, authConfigKeys.username);
    const password = readRequiredString(configs, authConfigKeys.password);
    this.credential = `Basic ${Buffer.from(`${username}:${password}`, "utf8").toString("base64")}`;
    this.preemptive = readBoolean(configs, authConfigKeys.preemptive, false);
  }

  prepare(request: HttpRequest): HttpRequest {
    return this.preemptive ? withAuthorization(request, this.credential) : request;
  }

  authenticate(request: HttpRequest): HttpRequest | null {
    // Same credentials already rejected.
    if (authorizationOf(request) === this.credential) return null;
    return withAuthorization(request, this.credential);
  }
}
