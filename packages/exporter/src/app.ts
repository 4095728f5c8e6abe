import Fastify, { type FastifyServerOptions, type FastifyError } from "fastify";
import { randomUUID } from "node:crypto";

import { Exporter } from "./exporter/exporter.js";
import { ScrapeTelemetry } from "./exporter/exposition.js";
import { MysqlAdminDb } from "./db/mysql-admin-db.js";
import { loadConfig, type ExporterConfig } from "./config.js";
import { ExporterError } from "./errors.js";
import { healthRoutes } from "./routes/health.js";
import { landingRoutes, metricsRoutes } from "./routes/metrics.js";

export interface BuildAppOptions extends FastifyServerOptions {
  /** Override the configuration (default: read from the environment) */
  config?: ExporterConfig;
  /** Override the exporter instance (for testing) */
  exporter?: Exporter;
  /** Override the telemetry registry (for testing) */
  telemetry?: ScrapeTelemetry;
}

/**
 * Build and configure the Fastify application.
 * Exported separately from the server start so tests can use `app.inject()`.
 */
export async function buildApp(opts?: BuildAppOptions) {
  const {
    config: customConfig,
    exporter: customExporter,
    telemetry: customTelemetry,
    ...fastifyOpts
  } = opts ?? {};

  const config = customConfig ?? loadConfig();

  const app = Fastify(
    Object.keys(fastifyOpts).length > 0
      ? fastifyOpts
      : {
          logger: config.isDev
            ? {
                level: config.logLevel,
                transport: {
                  target: "pino-pretty",
                  options: { colorize: true },
                },
              }
            : {
                // Production: structured JSON logging with redaction
                level: config.logLevel,
                redact: ["req.headers.authorization"],
              },
          genReqId: (req) => {
            const id = req.headers["x-request-id"];
            return typeof id === "string" && id ? id : randomUUID();
          },
        },
  );

  // Exporter + telemetry (decorated so routes can access them)
  const exporter =
    customExporter ??
    new Exporter({
      open: () =>
        MysqlAdminDb.connect({
          dsn: config.dsn,
          timeoutMs: config.timeoutMs,
          logger: app.log,
        }),
      groups: config.groups,
      timeoutMs: config.timeoutMs,
      logger: app.log.child({ module: "exporter" }),
    });
  const telemetry = customTelemetry ?? new ScrapeTelemetry();
  app.decorate("exporter", exporter);
  app.decorate("telemetry", telemetry);

  // ---------------------------------------------------------------------------
  // Global error handler — normalise error responses
  // ---------------------------------------------------------------------------
  app.setErrorHandler((error: FastifyError, request, reply) => {
    if (error.statusCode && error.statusCode < 500) {
      reply.status(error.statusCode).send({ error: error.message });
      return;
    }

    request.log.error({ err: error }, "request failed");
    const code = error instanceof ExporterError ? error.code : undefined;
    reply.status(error.statusCode ?? 500).send({
      error: config.isDev ? error.message : "Internal server error",
      ...(code ? { code } : {}),
    });
  });

  // ---------------------------------------------------------------------------
  // Routes
  // ---------------------------------------------------------------------------
  if (config.telemetryPath !== "/") {
    await app.register(landingRoutes, { telemetryPath: config.telemetryPath });
  }
  await app.register(metricsRoutes, { prefix: config.telemetryPath });
  await app.register(healthRoutes, { prefix: "/health" });

  // ---------------------------------------------------------------------------
  // Lifecycle hooks
  // ---------------------------------------------------------------------------

  app.addHook("onReady", async () => {
    app.log.info(
      { groups: exporter.enabledGroups, telemetryPath: config.telemetryPath },
      "exporter ready",
    );
  });

  // Release the admin connection on close
  app.addHook("onClose", async () => {
    await exporter.close();
  });

  return app;
}
