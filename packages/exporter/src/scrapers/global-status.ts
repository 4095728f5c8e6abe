/**
 * stats_mysql_global scraper.
 *
 * The table is a plain key/value row set: each (Variable_Name,
 * Variable_Value) pair maps to at most one unlabelled sample.
 */

import { MalformedValueError } from "../errors.js";
import { coerceValue } from "./coercion.js";
import { emitField, placeholderError, runQuery, toDesc, type TableScraper } from "./types.js";

export const GLOBAL_STATUS_QUERY =
  "SELECT Variable_Name, Variable_Value FROM stats.stats_mysql_global";

const NO_LABELS: readonly string[] = [];

export const globalStatusScraper: TableScraper = {
  group: "mysql_status",
  query: GLOBAL_STATUS_QUERY,

  labelNames: () => NO_LABELS,

  async scrape(db, table, sink) {
    const rows = await runQuery(db, "mysql_status", GLOBAL_STATUS_QUERY);

    for (const row of rows) {
      if (row.length !== 2) {
        sink.reject(
          new MalformedValueError(
            row[0]?.[1] ?? "stats_mysql_global",
            null,
            `expected 2 fields per row, got ${row.length}`,
          ),
        );
        continue;
      }

      const name = row[0][1];
      const raw = row[1][1];
      if (name === null) {
        sink.reject(new MalformedValueError("variable_name", raw, "variable name is NULL"));
        continue;
      }

      const key = name.toLowerCase();
      const descriptor = table.entries.get(key);
      if (descriptor === undefined) continue; // not in the registry
      if (descriptor === null) {
        sink.reject(placeholderError(key, raw));
        continue;
      }

      emitField(sink, () => {
        sink.emit({
          desc: toDesc(table, descriptor, NO_LABELS),
          labels: {},
          value: coerceValue(key, raw, descriptor.kind),
        });
      });
    }
  },
};
