import { ConfigurationError } from "../../core/errors/client.errors";

/**
 * Flat, string-keyed configuration bundle handed to the client and to every
 * strategy it resolves (authenticators, connectors).
 */
export type ClientConfigs = Readonly<Record<string, unknown>>;

export const readOptionalString = (configs: ClientConfigs, key: string): string | undefined => {
  const raw = configs[key];
  if (raw == null) return undefined;
  if (typeof raw !== "string") {
    throw new ConfigurationError(`${key} must be a string`, { key });
  }
  const normalized = raw.trim();
  return normalized === "" ? undefined : normalized;
};

export const readRequiredString = (configs: ClientConfigs, key: string): string => {
  const value = readOptionalString(configs, key);
  if (value == null) {
    throw new ConfigurationError(`Missing required configuration "${key}"`, { key });
  }
  return value;
};

export const readIntInRange = (
  configs: ClientConfigs,
  key: string,
  range: { min: number; max: number },
  fallback: number
): number => {
  const raw = configs[key];
  if (raw == null || (typeof raw === "string" && raw.trim() === "")) return fallback;

  const value = typeof raw === "number" ? raw : Number(raw);
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new ConfigurationError(`${key}=${String(raw)} is out of allowed range [${range.min}..${range.max}]`, { key });
  }
  return value;
};

export const readBoolean = (configs: ClientConfigs, key: string, fallback: boolean): boolean => {
  const raw = configs[key];
  if (raw == null) return fallback;
  if (typeof raw === "boolean") return raw;
  if (typeof raw === "string") {
    const normalized = raw.trim().toLowerCase();
    if (normalized === "") return fallback;
    if (normalized === "true" || normalized === "1") return true;
    if (normalized === "false" || normalized === "0") return false;
  }
  throw new ConfigurationError(`${key} must be a boolean. Received: ${String(raw)}`, { key });
};
