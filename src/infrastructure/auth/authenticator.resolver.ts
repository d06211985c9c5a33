import { clientConfigKeys, parseAuthType, type AuthType } from "../../application/http-poll/client.config";
import { ConfigurationError } from "../../core/errors/client.errors";
import type { Authenticator, AuthenticatorFactory } from "../../ports/Authenticator";
import { type ClientConfigs, readOptionalString } from "../../shared/config/client.configs";
import { BasicAuthenticator } from "./BasicAuthenticator";
import { NoneAuthenticator } from "./NoneAuthenticator";
import { NtlmAuthenticator } from "./NtlmAuthenticator";

/** Named factories that `http.auth.class` may refer to. */
export type AuthenticatorRegistry = Readonly<Record<string, AuthenticatorFactory>>;

const builtInAuthenticators: Record<Exclude<AuthType, "custom">, AuthenticatorFactory> = {
  none: () => new NoneAuthenticator(),
  basic: (configs) => new BasicAuthenticator(configs),
  ntlm: (configs) => new NtlmAuthenticator(configs)
};

const isAuthenticator = (value: unknown): value is Authenticator =>
  typeof value === "object" && value !== null && "authenticate" in value && typeof value.authenticate === "function";

type CandidateFactory = (configs: ClientConfigs) => unknown;

const lookupCustomFactory = (configs: ClientConfigs, registry: AuthenticatorRegistry): CandidateFactory => {
  const key = clientConfigKeys.authClass;
  const reference = configs[key];

  if (typeof reference === "function") {
    return (bundle): unknown => reference(bundle);
  }

  const name = readOptionalString(configs, key);
  if (name == null) {
    throw new ConfigurationError(`${key} is required when ${clientConfigKeys.authType}=custom`, { key });
  }

  const factory = Object.prototype.hasOwnProperty.call(registry, name) ? registry[name] : undefined;
  if (!factory) {
    throw new ConfigurationError(`${key}=${name} does not name a registered authenticator`, { key });
  }
  return factory;
};

const instantiateCustom = (factory: CandidateFactory, configs: ClientConfigs): Authenticator => {
  const key = clientConfigKeys.authClass;
  let candidate: unknown;
  try {
    candidate = factory(configs);
  } catch (err) {
    if (err instanceof ConfigurationError) throw err;
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`${key} could not be instantiated: ${reason}`, { key, cause: err });
  }

  if (!isAuthenticator(candidate)) {
    throw new ConfigurationError(`${key} did not produce an authenticator`, { key });
  }
  return candidate;
};

/**
 * Maps `http.auth.type` to a configured authenticator. Built-in strategies read
 * and validate their own settings from the same bundle.
 */
export const resolveAuthenticator = (configs: ClientConfigs, registry: AuthenticatorRegistry = {}): Authenticator => {
  const authType = parseAuthType(readOptionalString(configs, clientConfigKeys.authType));
  if (authType === "custom") {
    return instantiateCustom(lookupCustomFactory(configs, registry), configs);
  }
  return builtInAuthenticators[authType](configs);
};
