/**
 * Metric Descriptor Registry
 *
 * Static mapping from administrative field name to metric metadata, one
 * table per scrape group. The default tables live in the JSON files beside
 * this module; tests build reduced registries with createRegistry().
 *
 * A key mapped to `null` is a placeholder: the field is known but carries
 * no usable descriptor. Scrapers report it instead of emitting a metric.
 */

import { readFileSync } from "node:fs";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { MetricDescriptor, ScrapeGroup } from "@proxysql-exporter/shared";
import { RegistryError } from "../errors.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export const NAMESPACE = "proxysql";

export const SCRAPE_GROUPS: readonly ScrapeGroup[] = [
  "mysql_status",
  "mysql_connection_pool",
  "mysql_connection_list",
];

const DescriptorSchema = Type.Object({
  name: Type.String(),
  kind: Type.Union([Type.Literal("gauge"), Type.Literal("counter")]),
  help: Type.String(),
});

const TableSpecSchema = Type.Object({
  subsystem: Type.String(),
  metrics: Type.Record(Type.String(), Type.Union([DescriptorSchema, Type.Null()])),
});

/** Table as written in the JSON data files */
export type TableSpec = Static<typeof TableSpecSchema>;

export interface DescriptorTable {
  subsystem: string;
  entries: ReadonlyMap<string, MetricDescriptor | null>;
}

export type Registry = Readonly<Record<ScrapeGroup, DescriptorTable>>;

const TABLE_FILES: Record<ScrapeGroup, string> = {
  mysql_status: "mysql-status.json",
  mysql_connection_pool: "mysql-connection-pool.json",
  mysql_connection_list: "mysql-connection-list.json",
};

const NAME_RE = /^[a-z_][a-z0-9_]*$/;

// ---------------------------------------------------------------------------
// Construction
// ---------------------------------------------------------------------------

/** Build a registry from table specs. Throws RegistryError on bad names. */
export function createRegistry(specs: Record<ScrapeGroup, TableSpec>): Registry {
  const build = (spec: TableSpec): DescriptorTable => ({
    subsystem: spec.subsystem,
    entries: new Map(
      Object.entries(spec.metrics).map(
        ([key, d]): [string, MetricDescriptor | null] => [key, d ? { ...d } : null],
      ),
    ),
  });

  const registry: Registry = Object.freeze({
    mysql_status: build(specs.mysql_status),
    mysql_connection_pool: build(specs.mysql_connection_pool),
    mysql_connection_list: build(specs.mysql_connection_list),
  });
  assertRegistryInvariants(registry);
  return registry;
}

let defaultRegistry: Registry | null = null;

/** The registry shipped with the exporter (read once, then cached) */
export function loadDefaultRegistry(): Registry {
  if (!defaultRegistry) {
    defaultRegistry = createRegistry({
      mysql_status: readTableSpec("mysql_status"),
      mysql_connection_pool: readTableSpec("mysql_connection_pool"),
      mysql_connection_list: readTableSpec("mysql_connection_list"),
    });
  }
  return defaultRegistry;
}

function readTableSpec(group: ScrapeGroup): TableSpec {
  const file = TABLE_FILES[group];
  const parsed: unknown = JSON.parse(
    readFileSync(new URL(`./${file}`, import.meta.url), "utf8"),
  );
  if (!Value.Check(TableSpecSchema, parsed)) {
    const first = Value.Errors(TableSpecSchema, parsed).First();
    throw new RegistryError(
      `${file}: ${first ? `${first.path || "/"} ${first.message}` : "invalid table"}`,
    );
  }
  return parsed;
}

// ---------------------------------------------------------------------------
// Invariants
// ---------------------------------------------------------------------------

/**
 * Every key, descriptor name and subsystem must be a lowercase metric name
 * fragment (Prometheus naming convention).
 */
export function assertRegistryInvariants(registry: Registry): void {
  for (const group of SCRAPE_GROUPS) {
    const table = registry[group];
    if (!NAME_RE.test(table.subsystem)) {
      throw new RegistryError(`${group}: invalid subsystem "${table.subsystem}"`);
    }
    for (const [key, descriptor] of table.entries) {
      if (key !== key.toLowerCase()) {
        throw new RegistryError(`${group}: key "${key}" is not lowercase`);
      }
      if (descriptor && !NAME_RE.test(descriptor.name)) {
        throw new RegistryError(
          `${group}: metric name "${descriptor.name}" for "${key}" is not a lowercase metric name`,
        );
      }
    }
  }
}

// ---------------------------------------------------------------------------
// Lookup
// ---------------------------------------------------------------------------

/**
 * Find the descriptor for a raw column name.
 *
 * Returns `undefined` for unknown fields (skip silently) and `null` for
 * placeholder registrations (report).
 */
export function lookup(
  registry: Registry,
  group: ScrapeGroup,
  fieldName: string,
): MetricDescriptor | null | undefined {
  return registry[group].entries.get(fieldName.toLowerCase());
}

/** proxysql_<subsystem>_<name> */
export function qualifiedName(table: DescriptorTable, descriptor: MetricDescriptor): string {
  return `${NAMESPACE}_${table.subsystem}_${descriptor.name}`;
}
