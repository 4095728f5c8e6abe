/**
 * The handle scrapers query through. Kept as an interface so the engine
 * never depends on a driver directly (and tests can stand one in).
 */

import type { AdminRow } from "@proxysql-exporter/shared";

export interface AdminDb {
  /** Run a fixed admin query; rows keep the column order of the result */
  query(sql: string): Promise<AdminRow[]>;
  /** Reject if the connection is no longer usable */
  ping(): Promise<void>;
  close(): Promise<void>;
}

export type AdminDbOpener = () => Promise<AdminDb>;
