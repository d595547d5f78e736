import Fastify, { type FastifyServerOptions, type FastifyError } from "fastify";
import { randomUUID } from "node:crypto";

import { loadConfig, type ExporterConfig } from "./config.js";
import {
  HealthFetcher,
  ScrapeCounters,
  createClusterHealthMetrics,
  type ClusterHealthSource,
} from "./cluster-health/index.js";
import { healthRoutes } from "./routes/health.js";
import { metricsRoutes } from "./routes/metrics.js";

const isDev = process.env.NODE_ENV !== "production";

export interface BuildAppOptions extends FastifyServerOptions {
  /** Override the configuration (default: read from process.env) */
  config?: ExporterConfig;
  /** Override the health source (for testing) */
  healthSource?: ClusterHealthSource;
  /** Override the process-wide scrape counters (for testing) */
  scrapeCounters?: ScrapeCounters;
}

/**
 * Build and configure the Fastify application.
 * Exported separately from the server start so tests can use `app.inject()`.
 */
export async function buildApp(opts?: BuildAppOptions) {
  const {
    config: customConfig,
    healthSource: customSource,
    scrapeCounters: customCounters,
    ...fastifyOpts
  } = opts ?? {};

  const config = customConfig ?? loadConfig();

  const app = Fastify(
    Object.keys(fastifyOpts).length > 0
      ? fastifyOpts
      : {
          logger: isDev
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
          // Generate unique request IDs for tracing
          genReqId: (req) => {
            const header = req.headers["x-request-id"];
            return typeof header === "string" && header ? header : randomUUID();
          },
        },
  );

  // Fetcher, metric table and counters are built once and shared by every
  // scrape; each scrape still gets its own registry and collector.
  const healthSource =
    customSource ??
    new HealthFetcher({
      baseUrl: config.clusterUrl,
      timeoutMs: config.timeoutMs,
      logger: app.log,
    });
  app.decorate("config", config);
  app.decorate("healthSource", healthSource);
  app.decorate("clusterHealthMetrics", createClusterHealthMetrics(config.namespace));
  app.decorate("scrapeCounters", customCounters ?? new ScrapeCounters());

  // ---------------------------------------------------------------------------
  // Global error handler — normalise error responses
  // ---------------------------------------------------------------------------
  app.setErrorHandler((error: FastifyError, request, reply) => {
    // Known HTTP errors (4xx)
    if (error.statusCode && error.statusCode < 500) {
      reply.status(error.statusCode).send({
        error: error.message,
      });
      return;
    }

    // Unexpected errors — log full details, return generic message
    request.log.error({ err: error }, "unhandled error");
    reply.status(error.statusCode ?? 500).send({
      error: isDev ? error.message : "Internal server error",
    });
  });

  // ---------------------------------------------------------------------------
  // Routes
  // ---------------------------------------------------------------------------
  await app.register(healthRoutes, { prefix: "/healthz" });
  await app.register(metricsRoutes, { prefix: config.metricsPath });

  return app;
}
