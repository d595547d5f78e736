/**
 * Types for the cluster health endpoint (`/_cluster/health`).
 *
 * These describe the decoded shape the exporter works with, not the raw
 * JSON body (which uses snake_case keys).
 */

/** Health classification reported by the cluster */
export type ClusterStatus = "green" | "yellow" | "red";

/** One decoded `/_cluster/health` response. Frozen after decoding. */
export interface HealthSnapshot {
  clusterName: string;
  /** Raw status string; may fall outside ClusterStatus */
  status: string;
  timedOut: boolean;
  numberOfNodes: number;
  numberOfDataNodes: number;
  activePrimaryShards: number;
  activeShards: number;
  relocatingShards: number;
  initializingShards: number;
  unassignedShards: number;
  delayedUnassignedShards: number;
  numberOfPendingTasks: number;
  numberOfInFlightFetch: number;
  taskMaxWaitingInQueueMillis: number;
  /** 0–100 */
  activeShardsPercentAsNumber: number;
}
