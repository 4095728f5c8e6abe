export { globalStatusScraper, GLOBAL_STATUS_QUERY } from "./global-status.js";
export { connectionPoolScraper, CONNECTION_POOL_QUERY, poolLabels } from "./connection-pool.js";
export { connectionListScraper, CONNECTION_LIST_QUERY } from "./connection-list.js";
export * from "./coercion.js";
export type { SampleSink, TableScraper } from "./types.js";

import type { ScrapeGroup } from "@proxysql-exporter/shared";
import { globalStatusScraper } from "./global-status.js";
import { connectionPoolScraper } from "./connection-pool.js";
import { connectionListScraper } from "./connection-list.js";
import type { TableScraper } from "./types.js";

export const SCRAPERS: Readonly<Record<ScrapeGroup, TableScraper>> = {
  mysql_status: globalStatusScraper,
  mysql_connection_pool: connectionPoolScraper,
  mysql_connection_list: connectionListScraper,
};
