/**
 * stats_mysql_connection_pool scraper.
 *
 * One row per backend server. The hostgroup/endpoint labels are built once
 * per row and shared by every sample the row produces; `status` is emitted
 * through the ordinal table rather than as a label.
 *
 * The query selects every column so a renamed column (Latency_ms in older
 * releases, Latency_us later) only needs a registry entry, not a new query.
 */

import type { AdminRow, Labels } from "@proxysql-exporter/shared";
import { MalformedValueError } from "../errors.js";
import {
  POOL_LABEL_FIELDS,
  classifyPoolField,
  coercePoolField,
  endpointLabel,
  isPoolLabelField,
  type PoolLabelField,
} from "./coercion.js";
import { emitField, placeholderError, runQuery, toDesc, type TableScraper } from "./types.js";

export const CONNECTION_POOL_QUERY = "SELECT * FROM stats.stats_mysql_connection_pool";

export const POOL_LABEL_NAMES: readonly string[] = ["hostgroup", "endpoint"];

export const connectionPoolScraper: TableScraper = {
  group: "mysql_connection_pool",
  query: CONNECTION_POOL_QUERY,

  labelNames: () => POOL_LABEL_NAMES,

  async scrape(db, table, sink) {
    const rows = await runQuery(db, "mysql_connection_pool", CONNECTION_POOL_QUERY);

    for (const row of rows) {
      let labels: Labels;
      try {
        labels = poolLabels(row);
      } catch (err) {
        if (err instanceof MalformedValueError) {
          sink.reject(err);
          continue;
        }
        throw err;
      }

      for (const [column, raw] of row) {
        const field = column.toLowerCase();
        if (classifyPoolField(field) === "label") continue;

        const descriptor = table.entries.get(field);
        if (descriptor === undefined) continue;
        if (descriptor === null) {
          sink.reject(placeholderError(field, raw));
          continue;
        }

        emitField(sink, () => {
          const coerced = coercePoolField(field, raw, descriptor.kind);
          if (coerced.role !== "value") return;
          sink.emit({
            desc: toDesc(table, descriptor, POOL_LABEL_NAMES),
            labels: { ...labels },
            value: coerced.value,
          });
        });
      }
    }
  },
};

/** {hostgroup, endpoint} for one row; throws if a label column is missing */
export function poolLabels(row: AdminRow): Labels {
  const found: Partial<Record<PoolLabelField, string>> = {};
  for (const [column, raw] of row) {
    const field = column.toLowerCase();
    if (!isPoolLabelField(field)) continue;
    const coerced = coercePoolField(field, raw);
    if (coerced.role === "label") found[field] = coerced.value;
  }

  const { hostgroup, srv_host: host, srv_port: port } = found;
  if (hostgroup === undefined || host === undefined || port === undefined) {
    const missing = POOL_LABEL_FIELDS.filter((f) => found[f] === undefined);
    throw new MalformedValueError(
      "stats_mysql_connection_pool",
      null,
      `row is missing ${missing.join(", ")}`,
    );
  }
  return { hostgroup, endpoint: endpointLabel(host, port) };
}
