/**
 * Prometheus exposition via prom-client.
 *
 * Scrape samples go into a registry that lives for one request, so a family
 * that disappears from the admin tables disappears from the output too.
 * The exporter's own counters live in ScrapeTelemetry and survive across
 * scrapes.
 */

import { Counter, Gauge, Registry } from "prom-client";
import type { MetricDesc, MetricSample } from "@proxysql-exporter/shared";
import { NAMESPACE } from "../registry/index.js";
import type { CollectResult } from "./exporter.js";

// ---------------------------------------------------------------------------
// Samples
// ---------------------------------------------------------------------------

type Family = Gauge<string> | Counter<string>;

function createFamily(desc: MetricDesc, registry: Registry): Family {
  const config = {
    name: desc.name,
    help: desc.help,
    labelNames: [...desc.labelNames],
    registers: [registry],
  };
  return desc.kind === "counter" ? new Counter(config) : new Gauge(config);
}

/** Build a one-shot prom-client registry holding the given samples */
export function renderSamples(samples: readonly MetricSample[]): Registry {
  // a repeated series keeps its last value
  const series = new Map<string, MetricSample>();
  for (const sample of samples) {
    series.set(`${sample.desc.name}${JSON.stringify(sample.labels)}`, sample);
  }

  const registry = new Registry();
  const families = new Map<string, Family>();
  for (const sample of series.values()) {
    let family = families.get(sample.desc.name);
    if (!family) {
      family = createFamily(sample.desc, registry);
      families.set(sample.desc.name, family);
    }
    if (family instanceof Counter) {
      family.inc(sample.labels, sample.value);
    } else {
      family.set(sample.labels, sample.value);
    }
  }
  return registry;
}

// ---------------------------------------------------------------------------
// Self telemetry
// ---------------------------------------------------------------------------

export class ScrapeTelemetry {
  readonly registry = new Registry();

  private up = new Gauge({
    name: `${NAMESPACE}_up`,
    help: "Whether the ProxySQL admin interface could be reached (1 for yes, 0 for no).",
    registers: [this.registry],
  });

  private scrapes = new Counter({
    name: `${NAMESPACE}_exporter_scrapes_total`,
    help: "Total number of times ProxySQL was scraped for metrics.",
    registers: [this.registry],
  });

  private scrapeErrors = new Counter({
    name: `${NAMESPACE}_exporter_scrape_errors_total`,
    help: "Total number of times a collector failed while scraping ProxySQL.",
    labelNames: ["collector"],
    registers: [this.registry],
  });

  private lastError = new Gauge({
    name: `${NAMESPACE}_exporter_last_scrape_error`,
    help: "Whether the last scrape of metrics from ProxySQL resulted in an error (1 for error, 0 for success).",
    registers: [this.registry],
  });

  private lastDuration = new Gauge({
    name: `${NAMESPACE}_exporter_last_scrape_duration_seconds`,
    help: "Duration of the last scrape of metrics from ProxySQL.",
    registers: [this.registry],
  });

  record(result: CollectResult): void {
    const failed = result.groups.filter((g) => !g.ok);

    this.scrapes.inc();
    this.up.set(result.up ? 1 : 0);
    for (const report of failed) {
      this.scrapeErrors.inc({ collector: report.group });
    }
    this.lastError.set(!result.up || failed.length > 0 ? 1 : 0);
    this.lastDuration.set(result.durationMs / 1000);
  }
}

// ---------------------------------------------------------------------------
// Exposition
// ---------------------------------------------------------------------------

export interface Exposition {
  contentType: string;
  body: string;
}

export async function renderExposition(
  result: CollectResult,
  telemetry: ScrapeTelemetry,
): Promise<Exposition> {
  const registry = Registry.merge([renderSamples(result.samples), telemetry.registry]);
  return { contentType: registry.contentType, body: await registry.metrics() };
}
