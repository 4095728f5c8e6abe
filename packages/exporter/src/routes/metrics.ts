/**
 * Telemetry routes — the Prometheus scrape endpoint and a landing page.
 */

import type { FastifyPluginAsync } from "fastify";
import { renderExposition } from "../exporter/exposition.js";

export const metricsRoutes: FastifyPluginAsync = async (app) => {
  // -------------------------------------------------------------------------
  // GET <telemetry path>
  // -------------------------------------------------------------------------
  app.get("/", async (request, reply) => {
    const result = await app.exporter.collect();
    app.telemetry.record(result);

    const failed = result.groups.filter((g) => !g.ok).map((g) => g.group);
    request.log.debug(
      { up: result.up, samples: result.samples.length, failed, durationMs: result.durationMs },
      "scrape complete",
    );

    const { contentType, body } = await renderExposition(result, app.telemetry);
    return reply.header("content-type", contentType).send(body);
  });
};

export interface LandingOptions {
  telemetryPath: string;
}

export const landingRoutes: FastifyPluginAsync<LandingOptions> = async (app, opts) => {
  const page = `<html>
<head><title>ProxySQL Exporter</title></head>
<body>
<h1>ProxySQL Exporter</h1>
<p><a href="${opts.telemetryPath}">Metrics</a></p>
</body>
</html>
`;

  app.get("/", async (_request, reply) => {
    return reply.type("text/html; charset=utf-8").send(page);
  });
};
