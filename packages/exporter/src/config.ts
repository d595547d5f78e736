/**
 * Exporter configuration, read from environment variables.
 *
 * Values are coerced and validated with a Typebox schema; empty strings are
 * treated as unset so that `FOO=` falls back to the default.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const LogLevel = Type.Union(
  [
    Type.Literal("fatal"),
    Type.Literal("error"),
    Type.Literal("warn"),
    Type.Literal("info"),
    Type.Literal("debug"),
    Type.Literal("trace"),
    Type.Literal("silent"),
  ],
  { default: "info" },
);

export const EnvSchema = Type.Object({
  CLUSTER_URL: Type.String({ minLength: 1, default: "http://localhost:9200" }),
  CLUSTER_TIMEOUT_MS: Type.Integer({ minimum: 1, default: 5000 }),
  METRICS_NAMESPACE: Type.String({
    pattern: "^[a-zA-Z_][a-zA-Z0-9_]*$",
    default: "elasticsearch",
  }),
  METRICS_PATH: Type.String({ pattern: "^/", default: "/metrics" }),
  HOST: Type.String({ minLength: 1, default: "0.0.0.0" }),
  PORT: Type.Integer({ minimum: 0, maximum: 65535, default: 9114 }),
  LOG_LEVEL: LogLevel,
});

export type Env = Static<typeof EnvSchema>;

export type LogLevel = Static<typeof LogLevel>;

export interface ExporterConfig {
  clusterUrl: URL;
  timeoutMs: number;
  namespace: string;
  metricsPath: string;
  host: string;
  port: number;
  logLevel: LogLevel;
}

/** Thrown when the environment does not describe a usable configuration */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

// ---------------------------------------------------------------------------
// Loader
// ---------------------------------------------------------------------------

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ExporterConfig {
  const present: Record<string, string> = {};
  for (const key of Object.keys(EnvSchema.properties)) {
    const value = env[key];
    if (value !== undefined && value !== "") present[key] = value;
  }

  const candidate = Value.Convert(EnvSchema, Value.Default(EnvSchema, present));
  if (!Value.Check(EnvSchema, candidate)) {
    const details = [...Value.Errors(EnvSchema, candidate)]
      .map((e) => `${e.path.slice(1)}: ${e.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${details}`);
  }

  let clusterUrl: URL;
  try {
    clusterUrl = new URL(candidate.CLUSTER_URL);
  } catch {
    throw new ConfigError(`Invalid configuration: CLUSTER_URL is not a URL`);
  }
  if (clusterUrl.protocol !== "http:" && clusterUrl.protocol !== "https:") {
    throw new ConfigError(
      `Invalid configuration: CLUSTER_URL must use http or https, got ${clusterUrl.protocol}`,
    );
  }

  if (candidate.METRICS_PATH === "/healthz") {
    throw new ConfigError("Invalid configuration: METRICS_PATH collides with /healthz");
  }

  return {
    clusterUrl,
    timeoutMs: candidate.CLUSTER_TIMEOUT_MS,
    namespace: candidate.METRICS_NAMESPACE,
    metricsPath: candidate.METRICS_PATH,
    host: candidate.HOST,
    port: candidate.PORT,
    logLevel: candidate.LOG_LEVEL,
  };
}
