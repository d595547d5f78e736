import { describe, it, expect, vi, afterEach } from "vitest";
import type { FastifyInstance } from "fastify";
import type { HealthSnapshot } from "@cluster-health-exporter/shared";
import { buildApp } from "../app.js";
import type { ExporterConfig } from "../config.js";
import {
  HealthFetcher,
  UnexpectedStatusError,
  type ClusterHealthSource,
} from "../cluster-health/index.js";

// ---------------------------------------------------------------------------
// Test data
// ---------------------------------------------------------------------------

const TEST_CONFIG: ExporterConfig = {
  clusterUrl: new URL("http://es:9200"),
  timeoutMs: 1000,
  namespace: "elasticsearch",
  metricsPath: "/metrics",
  host: "127.0.0.1",
  port: 0,
  logLevel: "silent",
};

const NS = "elasticsearch_cluster_health";

/** A fetcher backed by a stub HTTP client that answers every call the same way */
function stubFetcher(status: number, body: string): HealthFetcher {
  return new HealthFetcher({
    baseUrl: TEST_CONFIG.clusterUrl,
    fetch: vi.fn().mockImplementation(() =>
      Promise.resolve(new Response(body, { status })),
    ),
  });
}

function sequenceSource(...results: (HealthSnapshot | Error)[]): ClusterHealthSource {
  const fetch = vi.fn();
  for (const r of results) {
    if (r instanceof Error) fetch.mockRejectedValueOnce(r);
    else fetch.mockResolvedValueOnce(r);
  }
  return { fetch };
}

function lines(body: string): string[] {
  return body.split("\n");
}

let app: FastifyInstance;

afterEach(async () => {
  await app?.close();
});

// ---------------------------------------------------------------------------
// Scrape route
// ---------------------------------------------------------------------------

describe("GET /metrics", () => {
  it("exposes field, status and counter samples for a healthy cluster", async () => {
    app = await buildApp({
      logger: false,
      config: TEST_CONFIG,
      healthSource: stubFetcher(
        200,
        JSON.stringify({ cluster_name: "prod", status: "yellow", active_primary_shards: 12 }),
      ),
    });

    const res = await app.inject({ method: "GET", url: "/metrics" });

    expect(res.statusCode).toBe(200);
    expect(res.headers["content-type"]).toMatch(/^text\/plain/);
    const out = lines(res.body);
    expect(out).toContain(`${NS}_active_primary_shards{cluster="prod"} 12`);
    expect(out).toContain(`${NS}_number_of_nodes{cluster="prod"} 0`);
    expect(out).toContain(`${NS}_status{cluster="prod",color="green"} 0`);
    expect(out).toContain(`${NS}_status{cluster="prod",color="yellow"} 1`);
    expect(out).toContain(`${NS}_status{cluster="prod",color="red"} 0`);
    expect(out).toContain(`${NS}_up 1`);
    expect(out).toContain(`${NS}_total_scrapes 1`);
    expect(out).toContain(`${NS}_json_parse_failures 0`);
  });

  it("reports only counters when the cluster answers 503", async () => {
    app = await buildApp({
      logger: false,
      config: TEST_CONFIG,
      healthSource: stubFetcher(503, "unavailable"),
    });

    const res = await app.inject({ method: "GET", url: "/metrics" });

    expect(res.statusCode).toBe(200);
    const samples = lines(res.body).filter((l) => l.startsWith(NS));
    expect(samples).toEqual([
      `${NS}_up 0`,
      `${NS}_total_scrapes 1`,
      `${NS}_json_parse_failures 0`,
    ]);
  });

  it("counts malformed bodies as JSON parse failures", async () => {
    app = await buildApp({
      logger: false,
      config: TEST_CONFIG,
      healthSource: stubFetcher(200, "<html>proxy error</html>"),
    });

    const res = await app.inject({ method: "GET", url: "/metrics" });

    const out = lines(res.body);
    expect(out).toContain(`${NS}_up 0`);
    expect(out).toContain(`${NS}_json_parse_failures 1`);
  });

  it("keeps counters across scrapes", async () => {
    const healthy: HealthSnapshot = Object.freeze({
      clusterName: "prod",
      status: "green",
      timedOut: false,
      numberOfNodes: 3,
      numberOfDataNodes: 3,
      activePrimaryShards: 5,
      activeShards: 10,
      relocatingShards: 0,
      initializingShards: 0,
      unassignedShards: 0,
      delayedUnassignedShards: 0,
      numberOfPendingTasks: 0,
      numberOfInFlightFetch: 0,
      taskMaxWaitingInQueueMillis: 0,
      activeShardsPercentAsNumber: 100,
    });
    app = await buildApp({
      logger: false,
      config: TEST_CONFIG,
      healthSource: sequenceSource(healthy, new UnexpectedStatusError(500), healthy),
    });

    await app.inject({ method: "GET", url: "/metrics" });
    await app.inject({ method: "GET", url: "/metrics" });
    const res = await app.inject({ method: "GET", url: "/metrics" });

    const out = lines(res.body);
    expect(out).toContain(`${NS}_up 1`);
    expect(out).toContain(`${NS}_total_scrapes 3`);
    expect(out).toContain(`${NS}_status{cluster="prod",color="green"} 1`);
    expect(out).toContain(`${NS}_active_shards_percent_as_number{cluster="prod"} 100`);
  });

  it("accepts any method", async () => {
    app = await buildApp({
      logger: false,
      config: TEST_CONFIG,
      healthSource: stubFetcher(503, ""),
    });

    const res = await app.inject({ method: "POST", url: "/metrics" });
    expect(res.statusCode).toBe(200);
    expect(lines(res.body)).toContain(`${NS}_up 0`);
  });

  it("honours the configured namespace and path", async () => {
    app = await buildApp({
      logger: false,
      config: { ...TEST_CONFIG, namespace: "search", metricsPath: "/probe" },
      healthSource: stubFetcher(503, ""),
    });

    const res = await app.inject({ method: "GET", url: "/probe" });
    expect(res.statusCode).toBe(200);
    expect(lines(res.body)).toContain("search_cluster_health_up 0");

    const old = await app.inject({ method: "GET", url: "/metrics" });
    expect(old.statusCode).toBe(404);
  });
});

// ---------------------------------------------------------------------------
// Liveness route
// ---------------------------------------------------------------------------

describe("GET /healthz", () => {
  it("reports the exporter as alive without contacting the cluster", async () => {
    const source = sequenceSource();
    app = await buildApp({ logger: false, config: TEST_CONFIG, healthSource: source });

    const res = await app.inject({ method: "GET", url: "/healthz" });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ status: "ok" });
    expect(source.fetch).not.toHaveBeenCalled();
  });
});
