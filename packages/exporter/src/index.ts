import { buildApp } from "./app.js";
import { loadConfig } from "./config.js";

// A ConfigError here is fatal: it propagates and the process exits non-zero
const config = loadConfig();

const app = await buildApp({ config });

// Start
try {
  await app.listen({ port: config.port, host: config.host });
  app.log.info(
    `Exporter listening on ${config.host}:${config.port}, scraping ${config.clusterUrl.origin}`,
  );
} catch (err) {
  app.log.error(err);
  process.exit(1);
}
