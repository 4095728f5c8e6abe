import { pino } from "pino";
import { buildApp } from "./app.js";
import { loadConfig, type ExporterConfig } from "./config.js";
import { redact } from "./db/dsn.js";

function readConfig(): ExporterConfig {
  try {
    return loadConfig();
  } catch (err) {
    pino().fatal({ err }, "invalid configuration");
    process.exit(1);
  }
}

const config = readConfig();
const app = await buildApp({ config });

// Start
try {
  await app.listen({ port: config.port, host: config.host });
  app.log.info(
    { dsn: redact(process.env.DATA_SOURCE_NAME ?? "") },
    `ProxySQL exporter listening on ${config.host}:${config.port}`,
  );
} catch (err) {
  app.log.error(err);
  process.exit(1);
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    app.log.info({ signal }, "shutting down");
    app.close().then(
      () => process.exit(0),
      (err: unknown) => {
        app.log.error({ err }, "shutdown failed");
        process.exit(1);
      },
    );
  });
}
