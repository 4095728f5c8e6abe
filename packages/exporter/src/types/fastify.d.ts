import "fastify";
import type { Exporter } from "../exporter/exporter.js";
import type { ScrapeTelemetry } from "../exporter/exposition.js";

declare module "fastify" {
  interface FastifyInstance {
    exporter: Exporter;
    telemetry: ScrapeTelemetry;
  }
}
