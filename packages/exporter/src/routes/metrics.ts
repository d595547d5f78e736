/**
 * Scrape route — one fresh registry and collector per request.
 *
 * Method agnostic: the backend may scrape with any verb.
 */

import type { FastifyPluginAsync } from "fastify";
import { ClusterHealthCollector } from "../cluster-health/index.js";
import { CollectorRegistry } from "../metrics/index.js";

export const metricsRoutes: FastifyPluginAsync = async (app) => {
  app.all("/", async (request, reply) => {
    const registry = new CollectorRegistry();
    registry.register(
      new ClusterHealthCollector({
        source: app.healthSource,
        metrics: app.clusterHealthMetrics,
        counters: app.scrapeCounters,
        logger: request.log,
      }),
    );

    const body = await registry.metrics();
    return reply.type(registry.contentType).send(body);
  });
};
