import "fastify";
import type { ExporterConfig } from "../config.js";
import type {
  ClusterHealthMetrics,
  ClusterHealthSource,
  ScrapeCounters,
} from "../cluster-health/index.js";

declare module "fastify" {
  interface FastifyInstance {
    config: ExporterConfig;
    healthSource: ClusterHealthSource;
    clusterHealthMetrics: ClusterHealthMetrics;
    scrapeCounters: ScrapeCounters;
  }
}
