import { ConfigurationError } from "../../core/errors/client.errors";
import { isHttpMethod, type HttpMethod } from "../../core/http/http.types";
import {
  type ClientConfigs,
  readIntInRange,
  readOptionalString,
  readRequiredString
} from "../../shared/config/client.configs";

export const clientConfigKeys = {
  serverUri: "http.serverUri",
  endpoint: "http.endpoint",
  method: "http.method",
  authType: "http.auth.type",
  authClass: "http.auth.class",
  timeoutMs: "http.timeoutMs",
  retries: "http.retries"
} as const;

export const authTypes = ["none", "basic", "ntlm", "custom"] as const;
export type AuthType = (typeof authTypes)[number];

export type HttpClientConfig = {
  serverUri: string;
  endpoint: string;
  method: HttpMethod;
  authType: AuthType;
  timeoutMs: number;
  retries: number;
};

export const defaultHttpClientConfig = {
  method: "GET",
  authType: "none",
  timeoutMs: 8000,
  retries: 2
} as const satisfies Partial<HttpClientConfig>;

export const httpClientCaps = {
  timeoutMs: { min: 1, max: 120000 },
  retries: { min: 0, max: 10 }
} as const;

const isAuthType = (value: string): value is AuthType => authTypes.some((authType) => authType === value);

export const parseAuthType = (raw: string | undefined): AuthType => {
  const normalized = (raw ?? defaultHttpClientConfig.authType).toLowerCase();
  if (!isAuthType(normalized)) {
    throw new ConfigurationError(
      `${clientConfigKeys.authType}=${String(raw)} is not one of ${authTypes.join(", ")}`,
      { key: clientConfigKeys.authType }
    );
  }
  return normalized;
};

const parseMethod = (raw: string | undefined): HttpMethod => {
  const normalized = (raw ?? defaultHttpClientConfig.method).toUpperCase();
  if (!isHttpMethod(normalized)) {
    throw new ConfigurationError(`${clientConfigKeys.method}=${String(raw)} is not a supported HTTP method`, {
      key: clientConfigKeys.method
    });
  }
  return normalized;
};

export const resolveHttpClientConfig = (configs: ClientConfigs): HttpClientConfig => ({
  serverUri: readRequiredString(configs, clientConfigKeys.serverUri),
  endpoint: readRequiredString(configs, clientConfigKeys.endpoint),
  method: parseMethod(readOptionalString(configs, clientConfigKeys.method)),
  authType: parseAuthType(readOptionalString(configs, clientConfigKeys.authType)),
  timeoutMs: readIntInRange(configs, clientConfigKeys.timeoutMs, httpClientCaps.timeoutMs, defaultHttpClientConfig.timeoutMs),
  retries: readIntInRange(configs, clientConfigKeys.retries, httpClientCaps.retries, defaultHttpClientConfig.retries)
});
