import { describe, it, expect } from "vitest";
import { loadConfig } from "./config.js";
import { ConfigError } from "./errors.js";

describe("loadConfig", () => {
  it("applies defaults for an empty environment", () => {
    expect(loadConfig({ NODE_ENV: "production" })).toEqual({
      dsn: { host: "localhost", port: 6032, user: "stats", password: "stats" },
      host: "0.0.0.0",
      port: 42004,
      telemetryPath: "/metrics",
      groups: {
        mysql_status: true,
        mysql_connection_pool: true,
        mysql_connection_list: true,
      },
      timeoutMs: 10000,
      logLevel: "info",
      isDev: false,
    });
  });

  it("converts numbers and booleans", () => {
    const config = loadConfig({
      PORT: "9104",
      SCRAPE_TIMEOUT_MS: "2500",
      COLLECT_MYSQL_CONNECTION_LIST: "false",
    });
    expect(config.port).toBe(9104);
    expect(config.timeoutMs).toBe(2500);
    expect(config.groups.mysql_connection_list).toBe(false);
    expect(config.groups.mysql_status).toBe(true);
    expect(config.isDev).toBe(true);
  });

  it("treats empty variables as unset", () => {
    expect(loadConfig({ PORT: "", TELEMETRY_PATH: "" }).telemetryPath).toBe("/metrics");
  });

  it("rejects an out of range port", () => {
    expect(() => loadConfig({ PORT: "70000" })).toThrow(ConfigError);
  });

  it("names the offending variable", () => {
    expect(() => loadConfig({ LOG_LEVEL: "loud" })).toThrow(/^LOG_LEVEL: /);
  });

  it("rejects an unparseable DSN", () => {
    expect(() => loadConfig({ DATA_SOURCE_NAME: "not a dsn" })).toThrow(ConfigError);
  });
});
