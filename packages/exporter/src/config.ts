/**
 * Exporter configuration, read from environment variables.
 *
 * Typebox gives the defaults, the string → number/boolean conversion and
 * the validation in one schema.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { ScrapeGroup } from "@proxysql-exporter/shared";
import { parseDsn, type AdminDsn } from "./db/dsn.js";
import { ConfigError } from "./errors.js";

export const EnvSchema = Type.Object({
  DATA_SOURCE_NAME: Type.String({ default: "stats:stats@tcp(localhost:6032)/" }),
  HOST: Type.String({ minLength: 1, default: "0.0.0.0" }),
  PORT: Type.Integer({ minimum: 1, maximum: 65535, default: 42004 }),
  TELEMETRY_PATH: Type.String({ pattern: "^/", default: "/metrics" }),
  COLLECT_MYSQL_STATUS: Type.Boolean({ default: true }),
  COLLECT_MYSQL_CONNECTION_POOL: Type.Boolean({ default: true }),
  COLLECT_MYSQL_CONNECTION_LIST: Type.Boolean({ default: true }),
  SCRAPE_TIMEOUT_MS: Type.Integer({ minimum: 1, default: 10_000 }),
  LOG_LEVEL: Type.Union(
    ["fatal", "error", "warn", "info", "debug", "trace", "silent"].map((l) => Type.Literal(l)),
    { default: "info" },
  ),
  NODE_ENV: Type.Optional(Type.String()),
});

export type Env = Static<typeof EnvSchema>;

export interface ExporterConfig {
  dsn: AdminDsn;
  host: string;
  port: number;
  telemetryPath: string;
  groups: Record<ScrapeGroup, boolean>;
  timeoutMs: number;
  logLevel: string;
  isDev: boolean;
}

/** Validate the environment and build the config. Throws ConfigError. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ExporterConfig {
  // Unset and empty variables both take the default
  const picked: Record<string, string> = {};
  for (const key of Object.keys(EnvSchema.properties)) {
    const value = env[key];
    if (value !== undefined && value !== "") picked[key] = value;
  }

  const value = Value.Convert(EnvSchema, Value.Default(EnvSchema, picked));
  if (!Value.Check(EnvSchema, value)) {
    const first = Value.Errors(EnvSchema, value).First();
    const variable = first?.path.replace(/^\//, "") ?? "environment";
    throw new ConfigError(`${variable}: ${first?.message ?? "invalid value"}`);
  }

  return {
    dsn: parseDsn(value.DATA_SOURCE_NAME),
    host: value.HOST,
    port: value.PORT,
    telemetryPath: value.TELEMETRY_PATH,
    groups: {
      mysql_status: value.COLLECT_MYSQL_STATUS,
      mysql_connection_pool: value.COLLECT_MYSQL_CONNECTION_POOL,
      mysql_connection_list: value.COLLECT_MYSQL_CONNECTION_LIST,
    },
    timeoutMs: value.SCRAPE_TIMEOUT_MS,
    logLevel: value.LOG_LEVEL,
    isDev: value.NODE_ENV !== "production",
  };
}
