/**
 * Cluster Health Collector — fetches `/_cluster/health` once per collect
 * cycle and emits one sample per metric table entry.
 *
 * IMPORTANT: Like the fetcher, this is independent of the web framework and
 * of the metrics library. It receives its dependencies via constructor
 * injection and talks to the registry only through the sinks.
 */

import type { FastifyBaseLogger } from "fastify";
import type {
  DescriptionSink,
  HealthSnapshot,
  MetricCollector,
  SampleSink,
} from "@cluster-health-exporter/shared";
import {
  CLUSTER_STATUSES,
  type ClusterHealthMetrics,
} from "./cluster-health-metrics.js";
import { DecodeError } from "./errors.js";
import type { ClusterHealthSource } from "./health-fetcher.js";

// ---------------------------------------------------------------------------
// Counters
// ---------------------------------------------------------------------------

/**
 * Operational counters. The exporter keeps one instance for the whole
 * process so totals keep growing across scrapes even though every scrape
 * gets a fresh collector.
 */
export class ScrapeCounters {
  /** 1 if the last fetch succeeded, 0 otherwise */
  up = 0;
  totalScrapes = 0;
  jsonParseFailures = 0;
}

export interface ClusterHealthCollectorOptions {
  source: ClusterHealthSource;
  metrics: ClusterHealthMetrics;
  logger: Pick<FastifyBaseLogger, "warn">;
  /** Shared counters (default: a private, zeroed set) */
  counters?: ScrapeCounters;
}

// ---------------------------------------------------------------------------
// ClusterHealthCollector
// ---------------------------------------------------------------------------

export class ClusterHealthCollector implements MetricCollector {
  private source: ClusterHealthSource;
  private metrics: ClusterHealthMetrics;
  private logger: Pick<FastifyBaseLogger, "warn">;
  private counters: ScrapeCounters;

  constructor(options: ClusterHealthCollectorOptions) {
    this.source = options.source;
    this.metrics = options.metrics;
    this.logger = options.logger;
    this.counters = options.counters ?? new ScrapeCounters();
  }

  describe(sink: DescriptionSink): void {
    for (const metric of this.metrics.fields) {
      sink(metric.description);
    }
    sink(this.metrics.status.description);

    sink(this.metrics.up);
    sink(this.metrics.totalScrapes);
    sink(this.metrics.jsonParseFailures);
  }

  async collect(sink: SampleSink): Promise<void> {
    this.counters.totalScrapes++;

    let health: HealthSnapshot;
    try {
      health = await this.source.fetch();
    } catch (err) {
      this.counters.up = 0;
      if (err instanceof DecodeError) this.counters.jsonParseFailures++;
      this.logger.warn({ err }, "failed to fetch and decode cluster health");
      this.emitCounters(sink);
      return;
    }

    this.counters.up = 1;

    const cluster = health.clusterName;
    for (const metric of this.metrics.fields) {
      sink({
        description: metric.description,
        value: metric.value(health),
        labels: { cluster },
      });
    }

    // One-hot across the closed domain; an unknown status yields all zeros
    const { status } = this.metrics;
    for (const color of CLUSTER_STATUSES) {
      sink({
        description: status.description,
        value: status.value(health, color),
        labels: { cluster, color },
      });
    }

    this.emitCounters(sink);
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  private emitCounters(sink: SampleSink): void {
    sink({ description: this.metrics.up, value: this.counters.up, labels: {} });
    sink({
      description: this.metrics.totalScrapes,
      value: this.counters.totalScrapes,
      labels: {},
    });
    sink({
      description: this.metrics.jsonParseFailures,
      value: this.counters.jsonParseFailures,
      labels: {},
    });
  }
}
