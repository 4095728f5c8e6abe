import { describe, it, expect, beforeAll, afterAll } from "vitest";
import type { FastifyInstance } from "fastify";
import { buildApp } from "../app.js";
import { loadConfig } from "../config.js";
import { Exporter } from "../exporter/exporter.js";
import { GLOBAL_STATUS_QUERY } from "../scrapers/global-status.js";
import { CONNECTION_POOL_QUERY } from "../scrapers/connection-pool.js";
import { CONNECTION_LIST_QUERY } from "../scrapers/connection-list.js";
import { FakeAdminDb, table } from "../test/fake-admin-db.js";

const config = loadConfig({ NODE_ENV: "test" });

function adminDb(): FakeAdminDb {
  return new FakeAdminDb({
    [GLOBAL_STATUS_QUERY]: table(["Variable_Name", "Variable_Value"], ["Active_Transactions", "3"]),
    [CONNECTION_POOL_QUERY]: table(
      ["hostgroup", "srv_host", "srv_port", "status"],
      ["0", "10.91.142.80", "3306", "ONLINE"],
    ),
    [CONNECTION_LIST_QUERY]: new Error("no such table: stats_mysql_processlist"),
  });
}

// ---------------------------------------------------------------------------
// GET /metrics
// ---------------------------------------------------------------------------

describe("GET /metrics", () => {
  let app: FastifyInstance;
  let db: FakeAdminDb;

  beforeAll(async () => {
    db = adminDb();
    app = await buildApp({
      logger: false,
      config,
      exporter: new Exporter({ open: async () => db }),
    });
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
  });

  it("serves the scrape in the Prometheus text format", async () => {
    const res = await app.inject({ method: "GET", url: "/metrics" });

    expect(res.statusCode).toBe(200);
    expect(res.headers["content-type"]).toMatch(/^text\/plain; version=0\.0\.4/);
    const lines = res.body.split("\n");
    expect(lines).toContain("proxysql_mysql_status_active_transactions 3");
    expect(lines).toContain('proxysql_connection_pool_status{hostgroup="0",endpoint="10.91.142.80:3306"} 1');
    expect(lines).toContain("proxysql_up 1");
  });

  it("still answers 200 when a collector fails", async () => {
    const res = await app.inject({ method: "GET", url: "/metrics" });

    expect(res.statusCode).toBe(200);
    const lines = res.body.split("\n");
    expect(lines).toContain('proxysql_exporter_scrape_errors_total{collector="mysql_connection_list"} 2');
    expect(lines).toContain("proxysql_exporter_last_scrape_error 1");
    expect(lines.some((l) => l.startsWith("proxysql_processlist_"))).toBe(false);
  });

  it("closes the admin connection with the app", async () => {
    const local = adminDb();
    const instance = await buildApp({
      logger: false,
      config,
      exporter: new Exporter({ open: async () => local }),
    });
    await instance.inject({ method: "GET", url: "/metrics" });

    await instance.close();

    expect(local.closed).toBe(true);
  });
});

describe("GET /metrics with the admin interface down", () => {
  let app: FastifyInstance;

  beforeAll(async () => {
    app = await buildApp({
      logger: false,
      config,
      exporter: new Exporter({
        open: async () => {
          throw new Error("connect ECONNREFUSED 127.0.0.1:6032");
        },
      }),
    });
  });

  afterAll(async () => {
    await app.close();
  });

  it("reports up=0 instead of failing the request", async () => {
    const res = await app.inject({ method: "GET", url: "/metrics" });

    expect(res.statusCode).toBe(200);
    expect(res.body.split("\n")).toContain("proxysql_up 0");
  });
});

// ---------------------------------------------------------------------------
// Landing page / custom telemetry path
// ---------------------------------------------------------------------------

describe("telemetry path", () => {
  let app: FastifyInstance;

  beforeAll(async () => {
    app = await buildApp({
      logger: false,
      config: { ...config, telemetryPath: "/proxysql/metrics" },
      exporter: new Exporter({ open: async () => adminDb() }),
    });
  });

  afterAll(async () => {
    await app.close();
  });

  it("links the telemetry path from the landing page", async () => {
    const res = await app.inject({ method: "GET", url: "/" });

    expect(res.statusCode).toBe(200);
    expect(res.headers["content-type"]).toBe("text/html; charset=utf-8");
    expect(res.body).toContain('<a href="/proxysql/metrics">Metrics</a>');
  });

  it("serves metrics on the configured path only", async () => {
    expect((await app.inject({ method: "GET", url: "/proxysql/metrics" })).statusCode).toBe(200);
    expect((await app.inject({ method: "GET", url: "/metrics" })).statusCode).toBe(404);
  });
});

// ---------------------------------------------------------------------------
// Values prom-client cannot render
// ---------------------------------------------------------------------------

describe("GET /metrics with an overflowing counter", () => {
  let app: FastifyInstance;

  beforeAll(async () => {
    const db = adminDb().respond(
      GLOBAL_STATUS_QUERY,
      table(["Variable_Name", "Variable_Value"], ["Client_Connections_created", "1e400"], ["Active_Transactions", "3"]),
    );
    app = await buildApp({ logger: false, config, exporter: new Exporter({ open: async () => db }) });
  });

  afterAll(async () => {
    await app.close();
  });

  it("skips the field and serves the rest", async () => {
    const res = await app.inject({ method: "GET", url: "/metrics" });

    expect(res.statusCode).toBe(200);
    const lines = res.body.split("\n");
    expect(lines).toContain("proxysql_mysql_status_active_transactions 3");
    expect(lines.some((l) => l.startsWith("proxysql_mysql_status_client_connections_created"))).toBe(false);
  });
});
