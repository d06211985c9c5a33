export type Env = {
  MONGO_URI: string;
  HTTP_SERVER_URI: string;
  HTTP_ENDPOINT: string;
  HTTP_METHOD?: string;
  HTTP_AUTH_TYPE: string;
  HTTP_AUTH_USERNAME?: string;
  HTTP_AUTH_PASSWORD?: string;
  HTTP_AUTH_DOMAIN?: string;
  HTTP_AUTH_WORKSTATION?: string;
  HTTP_AUTH_PREEMPTIVE?: string;
  HTTP_ITEMS_PATH?: string;
  HTTP_OFFSET_FIELD?: string;
  HTTP_OFFSET_PARAM?: string;
  HTTP_LIMIT_PARAM?: string;
};

const validateHttpUrl = (name: string, value: string): string => {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw new Error(`${name} must be a valid absolute http/https URL. Received: ${value}`);
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new Error(`${name} must use http or https scheme. Received: ${value}`);
  }

  return value;
};

const optional = (value: string | undefined): string | undefined => {
  const normalized = value?.trim();
  return normalized ? normalized : undefined;
};

const required = (env: NodeJS.ProcessEnv, name: string): string => {
  const value = optional(env[name]);
  if (value == null) throw new Error(`${name} is required`);
  return value;
};

export const loadEnv = (env: NodeJS.ProcessEnv = process.env): Env => ({
  MONGO_URI: optional(env.MONGO_URI) ?? "mongodb://localhost:27017/http_poll",
  HTTP_SERVER_URI: validateHttpUrl("HTTP_SERVER_URI", required(env, "HTTP_SERVER_URI")),
  HTTP_ENDPOINT: required(env, "HTTP_ENDPOINT"),
  HTTP_METHOD: optional(env.HTTP_METHOD),
  HTTP_AUTH_TYPE: optional(env.HTTP_AUTH_TYPE) ?? "none",
  HTTP_AUTH_USERNAME: optional(env.HTTP_AUTH_USERNAME),
  HTTP_AUTH_PASSWORD: optional(env.HTTP_AUTH_PASSWORD),
  HTTP_AUTH_DOMAIN: optional(env.HTTP_AUTH_DOMAIN),
  HTTP_AUTH_WORKSTATION: optional(env.HTTP_AUTH_WORKSTATION),
  HTTP_AUTH_PREEMPTIVE: optional(env.HTTP_AUTH_PREEMPTIVE),
  HTTP_ITEMS_PATH: optional(env.HTTP_ITEMS_PATH),
  HTTP_OFFSET_FIELD: optional(env.HTTP_OFFSET_FIELD),
  HTTP_OFFSET_PARAM: optional(env.HTTP_OFFSET_PARAM),
  HTTP_LIMIT_PARAM: optional(env.HTTP_LIMIT_PARAM)
});
