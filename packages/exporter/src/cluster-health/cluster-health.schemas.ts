/**
 * Typebox schema for the `/_cluster/health` response body.
 *
 * Every property carries a zero-value default so that missing fields decode
 * to 0 / "" / false. Unknown properties are allowed and ignored.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { HealthSnapshot } from "@cluster-health-exporter/shared";
import { DecodeError } from "./errors.js";

// ---------------------------------------------------------------------------
// Reusable fragments
// ---------------------------------------------------------------------------

const Count = Type.Integer({ default: 0 });

export const ClusterHealthBody = Type.Object({
  cluster_name: Type.String({ default: "" }),
  status: Type.String({ default: "" }),
  timed_out: Type.Boolean({ default: false }),
  number_of_nodes: Count,
  number_of_data_nodes: Count,
  active_primary_shards: Count,
  active_shards: Count,
  relocating_shards: Count,
  initializing_shards: Count,
  unassigned_shards: Count,
  delayed_unassigned_shards: Count,
  number_of_pending_tasks: Count,
  number_of_in_flight_fetch: Count,
  task_max_waiting_in_queue_millis: Count,
  active_shards_percent_as_number: Type.Number({ default: 0 }),
});

export type ClusterHealthBody = Static<typeof ClusterHealthBody>;

// ---------------------------------------------------------------------------
// Decoder
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Decode a raw response body into a frozen HealthSnapshot.
 * `null` properties are treated as missing.
 */
export function decodeClusterHealth(text: string): HealthSnapshot {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new DecodeError("cluster health response is not valid JSON", {
      cause: err,
    });
  }

  if (!isRecord(parsed)) {
    throw new DecodeError("cluster health response is not a JSON object");
  }

  const present = Object.fromEntries(
    Object.entries(parsed).filter(([, v]) => v !== null),
  );
  const body = Value.Default(ClusterHealthBody, present);

  if (!Value.Check(ClusterHealthBody, body)) {
    const first = Value.Errors(ClusterHealthBody, body).First();
    throw new DecodeError(
      `cluster health response does not match schema: ${first?.path ?? "/"} ${first?.message ?? "invalid value"}`,
      { metadata: { path: first?.path } },
    );
  }

  return Object.freeze({
    clusterName: body.cluster_name,
    status: body.status,
    timedOut: body.timed_out,
    numberOfNodes: body.number_of_nodes,
    numberOfDataNodes: body.number_of_data_nodes,
    activePrimaryShards: body.active_primary_shards,
    activeShards: body.active_shards,
    relocatingShards: body.relocating_shards,
    initializingShards: body.initializing_shards,
    unassignedShards: body.unassigned_shards,
    delayedUnassignedShards: body.delayed_unassigned_shards,
    numberOfPendingTasks: body.number_of_pending_tasks,
    numberOfInFlightFetch: body.number_of_in_flight_fetch,
    taskMaxWaitingInQueueMillis: body.task_max_waiting_in_queue_millis,
    activeShardsPercentAsNumber: body.active_shards_percent_as_number,
  });
}
