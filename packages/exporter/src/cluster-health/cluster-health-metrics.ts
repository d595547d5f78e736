/**
 * Static metric table for the cluster health collector.
 *
 * Built once at startup from the configured namespace and shared by every
 * collector instance. Nothing here is mutated after construction.
 */

import type {
  ClusterStatus,
  HealthSnapshot,
  MetricDescription,
} from "@cluster-health-exporter/shared";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const CLUSTER_HEALTH_SUBSYSTEM = "cluster_health";

/** Closed status domain, in emission order */
export const CLUSTER_STATUSES: readonly ClusterStatus[] = ["green", "yellow", "red"];

const CLUSTER_LABELS = ["cluster"] as const;
const STATUS_LABELS = ["cluster", "color"] as const;

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface FieldMetric {
  readonly description: MetricDescription;
  readonly value: (health: HealthSnapshot) => number;
}

export interface StatusMetric {
  readonly description: MetricDescription;
  readonly value: (health: HealthSnapshot, color: ClusterStatus) => number;
}

export interface ClusterHealthMetrics {
  readonly fields: readonly FieldMetric[];
  readonly status: StatusMetric;
  readonly up: MetricDescription;
  readonly totalScrapes: MetricDescription;
  readonly jsonParseFailures: MetricDescription;
}

// ---------------------------------------------------------------------------
// Builders
// ---------------------------------------------------------------------------

/** `<namespace>_<subsystem>_<name>`, skipping empty parts */
export function buildFqName(namespace: string, subsystem: string, name: string): string {
  return [namespace, subsystem, name].filter((part) => part !== "").join("_");
}

export function createClusterHealthMetrics(namespace: string): ClusterHealthMetrics {
  const fqName = (name: string) =>
    buildFqName(namespace, CLUSTER_HEALTH_SUBSYSTEM, name);

  const gauge = (
    name: string,
    help: string,
    value: FieldMetric["value"],
  ): FieldMetric => ({
    description: {
      name: fqName(name),
      help,
      type: "gauge",
      labelNames: CLUSTER_LABELS,
    },
    value,
  });

  const fields: FieldMetric[] = [
    gauge(
      "active_primary_shards",
      "The number of primary shards in the cluster, summed across all indices.",
      (h) => h.activePrimaryShards,
    ),
    gauge(
      "active_shards",
      "Total shards across all indices, replica shards included.",
      (h) => h.activeShards,
    ),
    gauge(
      "delayed_unassigned_shards",
      "Shards whose allocation is delayed to reduce reallocation overhead.",
      (h) => h.delayedUnassignedShards,
    ),
    gauge(
      "initializing_shards",
      "Shards that are being freshly created.",
      (h) => h.initializingShards,
    ),
    gauge(
      "number_of_data_nodes",
      "Number of data nodes in the cluster.",
      (h) => h.numberOfDataNodes,
    ),
    gauge(
      "number_of_in_flight_fetch",
      "The number of ongoing shard info requests.",
      (h) => h.numberOfInFlightFetch,
    ),
    gauge(
      "task_max_waiting_in_queue_millis",
      "Longest time a pending task has been waiting in the queue.",
      (h) => h.taskMaxWaitingInQueueMillis,
    ),
    gauge(
      "number_of_nodes",
      "Number of nodes in the cluster.",
      (h) => h.numberOfNodes,
    ),
    gauge(
      "number_of_pending_tasks",
      "Cluster-level changes which have not yet been executed.",
      (h) => h.numberOfPendingTasks,
    ),
    gauge(
      "relocating_shards",
      "Shards currently moving from one node to another.",
      (h) => h.relocatingShards,
    ),
    gauge(
      "unassigned_shards",
      "Shards that exist in the cluster state but cannot be found in the cluster itself.",
      (h) => h.unassignedShards,
    ),
    gauge(
      "active_shards_percent_as_number",
      "Percentage of shards that are active.",
      (h) => h.activeShardsPercentAsNumber,
    ),
  ];

  return {
    fields: Object.freeze(fields),
    status: {
      description: {
        name: fqName("status"),
        help: "Whether all primary and replica shards are allocated, one series per color.",
        type: "gauge",
        labelNames: STATUS_LABELS,
      },
      value: (h, color) => (h.status === color ? 1 : 0),
    },
    up: {
      name: fqName("up"),
      help: "Was the last scrape of the cluster health endpoint successful.",
      type: "gauge",
      labelNames: [],
    },
    totalScrapes: {
      name: fqName("total_scrapes"),
      help: "Current total cluster health scrapes.",
      type: "counter",
      labelNames: [],
    },
    jsonParseFailures: {
      name: fqName("json_parse_failures"),
      help: "Number of errors while parsing JSON.",
      type: "counter",
      labelNames: [],
    },
  };
}
