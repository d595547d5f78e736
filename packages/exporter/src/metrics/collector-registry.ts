/**
 * Collector registry — runs the describe/collect cycle on top of prom-client.
 *
 * Each description becomes a prom-client Gauge or Counter registered in a
 * private Registry. Before every serialization the registry resets those
 * metrics and asks each collector for fresh samples, so a metric that a
 * collector skips on a cycle renders with no series.
 */

import { Counter, Gauge, Registry } from "prom-client";
import type {
  MetricCollector,
  MetricDescription,
  MetricSample,
} from "@cluster-health-exporter/shared";

type PromMetric =
  | { type: "gauge"; metric: Gauge<string> }
  | { type: "counter"; metric: Counter<string> };

interface RegisteredCollector {
  collector: MetricCollector;
  /** prom-client metrics keyed by fully-qualified name */
  metrics: Map<string, PromMetric>;
}

export class CollectorRegistry {
  private registry = new Registry();
  private collectors: RegisteredCollector[] = [];

  /** Content-Type header value for the serialized output */
  get contentType(): string {
    return this.registry.contentType;
  }

  /**
   * Describe a collector and create its metrics.
   * Throws if a metric name is already registered.
   */
  register(collector: MetricCollector): void {
    const metrics = new Map<string, PromMetric>();
    collector.describe((description) => {
      metrics.set(description.name, this.createMetric(description));
    });
    this.collectors.push({ collector, metrics });
  }

  /** Collect from every registered collector and render the text format */
  async metrics(): Promise<string> {
    for (const { collector, metrics } of this.collectors) {
      for (const { metric } of metrics.values()) metric.reset();
      await collector.collect((sample) => record(metrics, sample));
    }
    return this.registry.metrics();
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  private createMetric(description: MetricDescription): PromMetric {
    const configuration = {
      name: description.name,
      help: description.help,
      labelNames: description.labelNames,
      registers: [this.registry],
    };
    return description.type === "counter"
      ? { type: "counter", metric: new Counter(configuration) }
      : { type: "gauge", metric: new Gauge(configuration) };
  }
}

function record(metrics: Map<string, PromMetric>, sample: MetricSample): void {
  const entry = metrics.get(sample.description.name);
  if (!entry) {
    throw new Error(`Metric "${sample.description.name}" was collected but never described`);
  }

  if (entry.type === "counter") {
    // Counters were reset before collect, so inc() sets the absolute value
    entry.metric.inc(sample.labels, sample.value);
  } else {
    entry.metric.set(sample.labels, sample.value);
  }
}
