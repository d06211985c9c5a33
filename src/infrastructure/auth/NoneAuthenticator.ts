import type { Authenticator } from "../../ports/Authenticator";

export class NoneAuthenticator implements Authenticator {
  readonly type = "none";

  authenticate(): null {
    return null;
  }
}
