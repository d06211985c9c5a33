import { type ClientConfigs, readOptionalString } from "../../shared/config/client.configs";

export const jsonConnectorKeys = {
  itemsPath: "http.response.itemsPath",
  offsetField: "http.offset.field",
  offsetParam: "http.offset.param",
  limitParam: "http.request.limitParam"
} as const;

export type JsonConnectorConfig = {
  itemsPath: string[];
  offsetField?: string;
  offsetParam?: string;
  limitParam?: string;
};

export const resolveJsonConnectorConfig = (configs: ClientConfigs): JsonConnectorConfig => ({
  itemsPath: (readOptionalString(configs, jsonConnectorKeys.itemsPath) ?? "")
    .split(".")
    .map((segment) => segment.trim())
    .filter((segment) => segment !== ""),
  offsetField: readOptionalString(configs, jsonConnectorKeys.offsetField),
  offsetParam: readOptionalString(configs, jsonConnectorKeys.offsetParam),
  limitParam: readOptionalString(configs, jsonConnectorKeys.limitParam)
});
