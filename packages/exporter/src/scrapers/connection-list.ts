/**
 * stats_mysql_processlist scraper.
 *
 * Each row yields two presence samples (value 1): one for the client host
 * and one for the backend host. Repeated hosts are emitted repeatedly.
 */

import { placeholderError, runQuery, toDesc, type TableScraper } from "./types.js";

export const CONNECTION_LIST_QUERY =
  "SELECT cli_host, srv_host FROM stats.stats_mysql_processlist";

interface HostColumn {
  /** Registry key of the family */
  key: string;
  label: string;
}

const HOST_COLUMNS: Readonly<Record<string, HostColumn>> = {
  cli_host: { key: "client_connection_list", label: "client_host" },
  srv_host: { key: "server_connection_list", label: "server_host" },
};

const LABELS_BY_KEY = new Map<string, readonly string[]>(
  Object.values(HOST_COLUMNS).map((c) => [c.key, [c.label]]),
);

function labelsFor(key: string): readonly string[] {
  return LABELS_BY_KEY.get(key) ?? [];
}

export const connectionListScraper: TableScraper = {
  group: "mysql_connection_list",
  query: CONNECTION_LIST_QUERY,

  labelNames: labelsFor,

  async scrape(db, table, sink) {
    const rows = await runQuery(db, "mysql_connection_list", CONNECTION_LIST_QUERY);

    for (const row of rows) {
      for (const [column, raw] of row) {
        const field = column.toLowerCase();
        const host = Object.hasOwn(HOST_COLUMNS, field) ? HOST_COLUMNS[field] : undefined;
        if (!host) continue;
        // idle client sessions have no backend yet
        if (raw === null || raw === "") continue;

        const descriptor = table.entries.get(host.key);
        if (descriptor === undefined) continue;
        if (descriptor === null) {
          sink.reject(placeholderError(host.key, raw));
          continue;
        }

        sink.emit({
          desc: toDesc(table, descriptor, labelsFor(host.key)),
          labels: { [host.label]: raw },
          value: 1,
        });
      }
    }
  },
};
