/**
 * Types for the ProxySQL metrics feed.
 *
 * These describe the descriptor registry, the samples produced by one
 * scrape cycle and the per-group report returned alongside them.
 */

// ---------------------------------------------------------------------------
// Descriptors
// ---------------------------------------------------------------------------

export type MetricKind = "gauge" | "counter";

/** Registry entry for one administrative field (name is the short form) */
export interface MetricDescriptor {
  /** Lowercase metric name without namespace/subsystem, e.g. "conn_used" */
  name: string;
  kind: MetricKind;
  help: string;
}

/** Fully-qualified metric family as published by describe() */
export interface MetricDesc {
  /** e.g. "proxysql_connection_pool_conn_used" */
  name: string;
  kind: MetricKind;
  help: string;
  labelNames: readonly string[];
}

/** Table groups the exporter knows how to scrape */
export type ScrapeGroup =
  | "mysql_status"
  | "mysql_connection_pool"
  | "mysql_connection_list";

// ---------------------------------------------------------------------------
// Samples
// ---------------------------------------------------------------------------

export type Labels = Record<string, string>;

export interface MetricSample {
  desc: MetricDesc;
  labels: Labels;
  value: number;
}

/** One raw result row: ordered (column name, text value) pairs */
export type AdminRow = ReadonlyArray<readonly [string, string | null]>;
