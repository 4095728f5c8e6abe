/**
 * Exporter Module
 *
 * Scrape-and-map engine for the ProxySQL admin interface: descriptor
 * registry, table scrapers and the Exporter orchestrating them.
 *
 * IMPORTANT: Nothing under this module may depend on the web framework.
 * The HTTP layer calls describe()/collect(); the exporter never calls back.
 */

export { Exporter } from "./exporter.js";
export type { ExporterOptions, CollectResult, GroupReport } from "./exporter.js";
export { ScrapeTelemetry, renderExposition, renderSamples } from "./exposition.js";
export type { Exposition } from "./exposition.js";
export { createRegistry, loadDefaultRegistry, lookup } from "../registry/index.js";
export type { Registry, DescriptorTable, TableSpec } from "../registry/index.js";
export type { AdminDb, AdminDbOpener } from "../db/admin-db.js";
export { MysqlAdminDb } from "../db/mysql-admin-db.js";
export * from "../errors.js";
