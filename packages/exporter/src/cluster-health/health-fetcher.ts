/**
 * Cluster health fetcher.
 *
 * Performs one GET against `<base>/_cluster/health` and decodes the body.
 * Timeouts are enforced through the request signal; nothing is retried.
 */

import { posix } from "node:path";
import type { FastifyBaseLogger } from "fastify";
import type { HealthSnapshot } from "@cluster-health-exporter/shared";
import { decodeClusterHealth } from "./cluster-health.schemas.js";
import {
  DecodeError,
  TransportError,
  UnexpectedStatusError,
} from "./errors.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export const CLUSTER_HEALTH_PATH = "/_cluster/health";

const DEFAULT_TIMEOUT_MS = 5_000;

/** Anything that can produce a health snapshot (the collector only needs this) */
export interface ClusterHealthSource {
  fetch(): Promise<HealthSnapshot>;
}

export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

export interface HealthFetcherOptions {
  /** Base URL of the cluster; may carry user:password credentials */
  baseUrl: URL | string;
  /** Request timeout in ms (default: 5000) */
  timeoutMs?: number;
  /** HTTP client (default: global fetch). Shared across concurrent scrapes. */
  fetch?: FetchFn;
  logger?: Pick<FastifyBaseLogger, "warn">;
}

// ---------------------------------------------------------------------------
// HealthFetcher
// ---------------------------------------------------------------------------

export class HealthFetcher implements ClusterHealthSource {
  private url: URL;
  private authorization: string | null;
  private timeoutMs: number;
  private fetchFn: FetchFn;
  private logger: Pick<FastifyBaseLogger, "warn"> | null;

  constructor(options: HealthFetcherOptions) {
    const { url, authorization } = buildRequestUrl(options.baseUrl);
    this.url = url;
    this.authorization = authorization;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.logger = options.logger ?? null;
  }

  /** The URL requested on every fetch (credentials removed) */
  get requestUrl(): string {
    return this.url.toString();
  }

  async fetch(): Promise<HealthSnapshot> {
    const headers: Record<string, string> = { accept: "application/json" };
    if (this.authorization) headers.authorization = this.authorization;

    let res: Response;
    try {
      res = await this.fetchFn(this.requestUrl, {
        method: "GET",
        headers,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      throw new TransportError(
        `failed to get cluster health from ${this.requestUrl}: ${errorMessage(err)}`,
        { cause: err },
      );
    }

    try {
      if (res.status !== 200) {
        throw new UnexpectedStatusError(res.status);
      }

      let text: string;
      try {
        text = await res.text();
      } catch (err) {
        throw new DecodeError(
          `failed to read cluster health response: ${errorMessage(err)}`,
          { cause: err },
        );
      }

      return decodeClusterHealth(text);
    } finally {
      await this.release(res);
    }
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  /** Cancel an unread body so the connection goes back to the pool */
  private async release(res: Response): Promise<void> {
    if (res.bodyUsed || !res.body) return;
    try {
      await res.body.cancel();
    } catch (err) {
      this.logger?.warn({ err }, "failed to release cluster health response body");
    }
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Join the health path onto the base URL's path and move any userinfo into
 * a Basic authorization header (fetch rejects URLs with credentials).
 */
export function buildRequestUrl(baseUrl: URL | string): {
  url: URL;
  authorization: string | null;
} {
  const url = new URL(baseUrl.toString());
  url.pathname = posix.join(url.pathname, CLUSTER_HEALTH_PATH);

  let authorization: string | null = null;
  if (url.username || url.password) {
    const user = decodeURIComponent(url.username);
    const pass = decodeURIComponent(url.password);
    authorization = `Basic ${Buffer.from(`${user}:${pass}`).toString("base64")}`;
    url.username = "";
    url.password = "";
  }

  return { url, authorization };
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
