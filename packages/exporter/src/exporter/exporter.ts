/**
 * Exporter — one scrape cycle against the ProxySQL admin interface.
 *
 * describe() publishes the static set of metric families; collect() opens
 * (or revalidates) the admin handle, runs the table scrapers and returns
 * their samples together with a per-group report.
 *
 * Like the scrapers, this is independent of the web framework. The HTTP
 * layer owns rendering and the exporter's own telemetry.
 */

import { pino, type BaseLogger } from "pino";
import type { MetricDesc, MetricSample, ScrapeGroup } from "@proxysql-exporter/shared";
import type { AdminDb, AdminDbOpener } from "../db/admin-db.js";
import {
  ConnectionError,
  MalformedValueError,
  RegistryError,
  ScrapeError,
  TimeoutError,
  describeCause,
} from "../errors.js";
import { withTimeout } from "../db/timeout.js";
import { SCRAPE_GROUPS, loadDefaultRegistry, type Registry } from "../registry/index.js";
import { SCRAPERS } from "../scrapers/index.js";
import { toDesc } from "../scrapers/types.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ExporterOptions {
  /** Opens a new admin handle; called lazily and again after a failed ping */
  open: AdminDbOpener;
  /** Descriptor tables (default: the tables shipped with the exporter) */
  registry?: Registry;
  /** Groups to scrape (default: all) */
  groups?: Partial<Record<ScrapeGroup, boolean>>;
  /** Run the scrapers concurrently (default: true) */
  concurrent?: boolean;
  /** Upper bound on opening, pinging and closing a handle, in ms (default: 10000) */
  timeoutMs?: number;
  logger?: BaseLogger;
}

export interface GroupReport {
  group: ScrapeGroup;
  ok: boolean;
  samples: number;
  error?: ScrapeError;
  /** Fields skipped during the scrape */
  rejected: MalformedValueError[];
}

export interface CollectResult {
  /** Whether the admin interface could be reached */
  up: boolean;
  samples: MetricSample[];
  groups: GroupReport[];
  durationMs: number;
  error?: ConnectionError;
}

// ---------------------------------------------------------------------------
// Exporter
// ---------------------------------------------------------------------------

export class Exporter {
  private open: AdminDbOpener;
  private registry: Registry;
  private groups: ScrapeGroup[];
  private concurrent: boolean;
  private timeoutMs: number;
  private logger: BaseLogger;

  /** Cached admin handle, reused across scrapes */
  private handle: AdminDb | null = null;
  /** In-flight revalidation or open; concurrent callers share it */
  private acquiring: Promise<AdminDb> | null = null;

  constructor(options: ExporterOptions) {
    this.open = options.open;
    this.registry = options.registry ?? loadDefaultRegistry();
    this.groups = SCRAPE_GROUPS.filter((g) => options.groups?.[g] ?? true);
    this.concurrent = options.concurrent ?? true;
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.logger = options.logger ?? pino({ level: "silent" });
  }

  /** Groups this exporter scrapes */
  get enabledGroups(): readonly ScrapeGroup[] {
    return this.groups;
  }

  /**
   * Metric families of the enabled groups. Never touches the database.
   * Registry keys that alias the same family are published once.
   */
  describe(): MetricDesc[] {
    const byName = new Map<string, MetricDesc>();

    for (const group of this.groups) {
      const table = this.registry[group];
      const scraper = SCRAPERS[group];
      for (const [key, descriptor] of table.entries) {
        if (!descriptor) continue;
        const desc = toDesc(table, descriptor, scraper.labelNames(key));
        const existing = byName.get(desc.name);
        if (existing && !sameDesc(existing, desc)) {
          throw new RegistryError(`conflicting descriptors for ${desc.name}`);
        }
        byName.set(desc.name, desc);
      }
    }

    return Array.from(byName.values());
  }

  /** Run one scrape cycle. Never throws. */
  async collect(): Promise<CollectResult> {
    const start = performance.now();

    let db: AdminDb;
    try {
      db = await this.db();
    } catch (err) {
      const error =
        err instanceof ConnectionError
          ? err
          : new ConnectionError(`cannot reach admin interface: ${describeCause(err)}`, { cause: err });
      this.logger.error({ err: error }, "scrape aborted: no admin connection");
      return { up: false, samples: [], groups: [], durationMs: performance.now() - start, error };
    }

    const samples: MetricSample[] = [];
    const groups: GroupReport[] = [];

    const run = async (group: ScrapeGroup): Promise<void> => {
      const report = await this.scrapeGroup(db, group);
      // merge point: a group's samples land together, in completion order
      samples.push(...report.buffer);
      groups.push(report.report);
    };

    if (this.concurrent) {
      await Promise.allSettled(this.groups.map(run));
    } else {
      for (const group of this.groups) {
        await run(group);
      }
    }

    return { up: true, samples, groups, durationMs: performance.now() - start };
  }

  /** Whether the admin interface answers (opens the handle if needed) */
  async ping(): Promise<boolean> {
    try {
      await this.db();
      return true;
    } catch {
      return false;
    }
  }

  /** Close the cached handle, waiting for an acquisition in flight */
  async close(): Promise<void> {
    const acquiring = this.acquiring;
    if (acquiring) {
      await acquiring.then(
        () => undefined,
        (err: unknown) => {
          this.logger.debug({ err }, "admin connection was not open at close");
        },
      );
    }
    const handle = this.handle;
    this.handle = null;
    if (handle) await withTimeout(handle.close(), this.timeoutMs, "admin close");
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  /** The admin handle; one acquisition at a time */
  private db(): Promise<AdminDb> {
    if (!this.acquiring) {
      this.acquiring = this.acquire().finally(() => {
        this.acquiring = null;
      });
    }
    return this.acquiring;
  }

  /** Cached handle if it still answers a ping, otherwise a fresh one */
  private async acquire(): Promise<AdminDb> {
    if (this.handle) {
      const handle = this.handle;
      try {
        await withTimeout(handle.ping(), this.timeoutMs, "admin ping");
        return handle;
      } catch (err) {
        this.logger.warn({ err }, "admin connection lost, reconnecting");
        this.handle = null;
        await withTimeout(handle.close(), this.timeoutMs, "admin close").catch(
          (closeErr: unknown) => {
            this.logger.debug({ err: closeErr }, "closing stale admin connection failed");
          },
        );
      }
    }

    const opening = this.open();
    try {
      this.handle = await withTimeout(opening, this.timeoutMs, "admin connect");
    } catch (err) {
      if (err instanceof TimeoutError) this.closeLate(opening);
      throw new ConnectionError(`cannot reach admin interface: ${describeCause(err)}`, { cause: err });
    }
    return this.handle;
  }

  /** A handle that opens after its timeout is closed as soon as it arrives */
  private closeLate(opening: Promise<AdminDb>): void {
    opening
      .then((late) => late.close())
      .catch((err: unknown) => {
        this.logger.debug({ err }, "closing late admin connection failed");
      });
  }

  private async scrapeGroup(
    db: AdminDb,
    group: ScrapeGroup,
  ): Promise<{ buffer: MetricSample[]; report: GroupReport }> {
    const buffer: MetricSample[] = [];
    const rejected: MalformedValueError[] = [];
    const sink = {
      emit: (sample: MetricSample) => {
        buffer.push(sample);
      },
      reject: (error: MalformedValueError) => {
        rejected.push(error);
        this.logger.warn({ group, field: error.field, err: error }, "skipping malformed field");
      },
    };

    try {
      await SCRAPERS[group].scrape(db, this.registry[group], sink);
    } catch (err) {
      const error =
        err instanceof ScrapeError
          ? err
          : new ScrapeError(group, `${group} scrape failed: ${describeCause(err)}`, { cause: err });
      this.logger.error({ group, err: error }, "scrape failed");
      return { buffer: [], report: { group, ok: false, samples: 0, error, rejected } };
    }

    return { buffer, report: { group, ok: true, samples: buffer.length, rejected } };
  }
}

function sameDesc(a: MetricDesc, b: MetricDesc): boolean {
  return (
    a.kind === b.kind &&
    a.help === b.help &&
    a.labelNames.length === b.labelNames.length &&
    a.labelNames.every((l, i) => l === b.labelNames[i])
  );
}
