export type { ClusterStatus, HealthSnapshot } from "./types/cluster-health.js";
export type {
  DescriptionSink,
  MetricCollector,
  MetricDescription,
  MetricSample,
  MetricType,
  SampleSink,
} from "./types/metrics.js";
