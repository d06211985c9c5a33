import { HttpApiClient, type HttpApiClientStrategies } from "../../application/http-poll/HttpApiClient";
import type { ClientConfigs } from "../../shared/config/client.configs";
import { CursorOffsetUpdater, CursorRequestBuilder } from "./cursor.strategies";
import { resolveJsonConnectorConfig } from "./json.config";
import { JsonItemsExtractor } from "./JsonItemsExtractor";

export const createJsonHttpClient = (
  configs: ClientConfigs,
  deps: Pick<HttpApiClientStrategies<unknown>, "createTransport" | "authenticators"> = {}
): HttpApiClient<unknown> => {
  const connector = resolveJsonConnectorConfig(configs);

  return new HttpApiClient<unknown>(configs, {
    ...deps,
    extractor: new JsonItemsExtractor(connector.itemsPath),
    offsetUpdater: connector.offsetField ? new CursorOffsetUpdater(connector.offsetField) : undefined,
    requestBuilder: new CursorRequestBuilder({
      offsetParam: connector.offsetParam,
      limitParam: connector.limitParam
    })
  });
};
