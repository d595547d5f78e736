/**
 * Cluster Health Module
 *
 * Fetches `/_cluster/health` and maps it onto metric samples.
 */

export { ClusterHealthCollector, ScrapeCounters } from "./cluster-health-collector.js";
export type { ClusterHealthCollectorOptions } from "./cluster-health-collector.js";
export {
  CLUSTER_HEALTH_SUBSYSTEM,
  CLUSTER_STATUSES,
  buildFqName,
  createClusterHealthMetrics,
} from "./cluster-health-metrics.js";
export type { ClusterHealthMetrics, FieldMetric, StatusMetric } from "./cluster-health-metrics.js";
export { HealthFetcher, CLUSTER_HEALTH_PATH, buildRequestUrl } from "./health-fetcher.js";
export type { ClusterHealthSource, FetchFn, HealthFetcherOptions } from "./health-fetcher.js";
export { decodeClusterHealth } from "./cluster-health.schemas.js";
export {
  ClusterHealthError,
  DecodeError,
  TransportError,
  UnexpectedStatusError,
} from "./errors.js";
