/// <reference path="../../types/httpntlm.d.ts" />
import { ntlm, type NtlmOptions } from "httpntlm";
import type { HttpRequest } from "../../core/http/http.types";
import type { AuthChallenge, Authenticator } from "../../ports/Authenticator";
import { type ClientConfigs, readOptionalString, readRequiredString } from "../../shared/config/client.configs";
import { authorizationOf, withAuthorization } from "./auth.headers";
import { authConfigKeys } from "./BasicAuthenticator";

const NTLM_CHALLENGE = /(?:^|,)\s*NTLM(?:\s+([A-Za-z0-9+/=]+))?\s*(?:,|$)/i;

/**
 * NTLM handshake on top of 401 challenges:
 * bare `NTLM` challenge -> negotiate (type 1), `NTLM <token>` -> authenticate (type 3).
 */
export class NtlmAuthenticator implements Authenticator {
  readonly type = "ntlm";
  private readonly options: NtlmOptions;

  constructor(configs: ClientConfigs) {
    this.options = {
      username: readRequiredString(configs, authConfigKeys.username),
      password: readRequiredString(configs, authConfigKeys.password),
      domain: readOptionalString(configs, authConfigKeys.domain) ?? "",
      workstation: readOptionalString(configs, authConfigKeys.workstation) ?? ""
    };
  }

  authenticate(request: HttpRequest, challenge: AuthChallenge): HttpRequest | null {
    const match = NTLM_CHALLENGE.exec(challenge.headers.get("www-authenticate") ?? "");
    if (!match) return null;

    const token = match[1];
    if (token == null) {
      // A bare challenge after we already sent NTLM means our messages were rejected.
      if (authorizationOf(request)?.startsWith("NTLM ")) return null;
      return withAuthorization(request, ntlm.createType1Message(this.options));
    }

    // The codec reports some malformed messages through the callback and throws on others.
    try {
      const parseErrors: Error[] = [];
      const type2 = ntlm.parseType2Message(`NTLM ${token}`, (err) => {
        parseErrors.push(err);
      });
      if (parseErrors.length > 0 || type2 == null) return null;

      return withAuthorization(request, ntlm.createType3Message(type2, this.options));
    } catch (err) {
      // eslint-disable-next-line no-console
      console.warn(JSON.stringify({
        event: "auth.ntlm_challenge_rejected",
        round: challenge.round,
        message: err instanceof Error ? err.message : String(err)
      }));
      return null;
    }
  }
}
