/**
 * Pull-protocol contract between collectors and a metrics registry.
 *
 * A registry asks each collector to describe every metric it can produce
 * (once), then asks it to collect samples on every scrape.
 *
 * IMPORTANT: This contract must remain independent of the metrics library
 * and the web framework.
 */

export type MetricType = "gauge" | "counter";

export interface MetricDescription {
  /** Fully-qualified name, e.g. "elasticsearch_cluster_health_up" */
  name: string;
  help: string;
  type: MetricType;
  labelNames: readonly string[];
}

export interface MetricSample {
  description: MetricDescription;
  value: number;
  /** Must use exactly the description's label names */
  labels: Readonly<Record<string, string>>;
}

export type DescriptionSink = (description: MetricDescription) => void;
export type SampleSink = (sample: MetricSample) => void;

export interface MetricCollector {
  describe(sink: DescriptionSink): void;
  /** Must not reject because the scraped target is unavailable */
  collect(sink: SampleSink): Promise<void>;
}
