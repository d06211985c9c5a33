import type { Partition } from "../../src/core/polling/polling.types";

export const baseConfigs = {
  "http.serverUri": "http://api.example.com",
  "http.endpoint": "/items"
};

export const itemsPartition: Partition = {
  url: "http://api.example.com/items",
  method: "GET",
  metadata: {}
};
