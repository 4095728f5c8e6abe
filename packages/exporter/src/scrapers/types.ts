import type {
  AdminRow,
  MetricDesc,
  MetricDescriptor,
  MetricSample,
  ScrapeGroup,
} from "@proxysql-exporter/shared";
import type { AdminDb } from "../db/admin-db.js";
import { MalformedValueError, QueryError } from "../errors.js";
import { qualifiedName, type DescriptorTable } from "../registry/index.js";

/** Where a scraper writes: samples, and the fields it had to skip */
export interface SampleSink {
  emit(sample: MetricSample): void;
  reject(error: MalformedValueError): void;
}

export interface TableScraper {
  group: ScrapeGroup;
  query: string;
  /** Label names of the family published for a registry key */
  labelNames(key: string): readonly string[];
  scrape(db: AdminDb, table: DescriptorTable, sink: SampleSink): Promise<void>;
}

/** Run the group's query, wrapping any driver failure in a QueryError */
export async function runQuery(
  db: AdminDb,
  group: ScrapeGroup,
  sql: string,
): Promise<AdminRow[]> {
  try {
    return await db.query(sql);
  } catch (err) {
    throw new QueryError(group, sql, err);
  }
}

/**
 * Run one field's coercion and emission. A MalformedValueError skips just
 * that field; anything else propagates and fails the group.
 */
export function emitField(sink: SampleSink, fn: () => void): void {
  try {
    fn();
  } catch (err) {
    if (err instanceof MalformedValueError) {
      sink.reject(err);
      return;
    }
    throw err;
  }
}

export function placeholderError(field: string, raw: string | null): MalformedValueError {
  return new MalformedValueError(field, raw, "registered without a metric descriptor", "PLACEHOLDER_DESCRIPTOR");
}

export function toDesc(
  table: DescriptorTable,
  descriptor: MetricDescriptor,
  labelNames: readonly string[],
): MetricDesc {
  return {
    name: qualifiedName(table, descriptor),
    kind: descriptor.kind,
    help: descriptor.help,
    labelNames,
  };
}
