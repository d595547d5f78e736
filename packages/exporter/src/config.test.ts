import { describe, it, expect } from "vitest";
import { ConfigError, loadConfig } from "./config.js";

describe("loadConfig", () => {
  it("applies defaults for an empty environment", () => {
    const config = loadConfig({});

    expect(config.clusterUrl.toString()).toBe("http://localhost:9200/");
    expect(config).toMatchObject({
      timeoutMs: 5000,
      namespace: "elasticsearch",
      metricsPath: "/metrics",
      host: "0.0.0.0",
      port: 9114,
      logLevel: "info",
    });
  });

  it("coerces numeric variables", () => {
    const config = loadConfig({
      CLUSTER_URL: "https://es.example.test:9243/base",
      CLUSTER_TIMEOUT_MS: "2500",
      PORT: "9200",
      LOG_LEVEL: "debug",
    });

    expect(config.clusterUrl.pathname).toBe("/base");
    expect(config.timeoutMs).toBe(2500);
    expect(config.port).toBe(9200);
    expect(config.logLevel).toBe("debug");
  });

  it("treats empty strings as unset", () => {
    const config = loadConfig({ METRICS_NAMESPACE: "", PORT: "" });
    expect(config.namespace).toBe("elasticsearch");
    expect(config.port).toBe(9114);
  });

  it("rejects an invalid namespace", () => {
    expect(() => loadConfig({ METRICS_NAMESPACE: "my-exporter" })).toThrow(ConfigError);
  });

  it("rejects non-numeric ports", () => {
    expect(() => loadConfig({ PORT: "abc" })).toThrow(/PORT/);
  });

  it("rejects unknown log levels", () => {
    expect(() => loadConfig({ LOG_LEVEL: "verbose" })).toThrow(ConfigError);
  });

  it("rejects URLs that are not http(s)", () => {
    expect(() => loadConfig({ CLUSTER_URL: "ftp://es:21" })).toThrow(
      "Invalid configuration: CLUSTER_URL must use http or https, got ftp:",
    );
    expect(() => loadConfig({ CLUSTER_URL: "not a url" })).toThrow(
      "Invalid configuration: CLUSTER_URL is not a URL",
    );
  });

  it("rejects a metrics path that collides with the liveness route", () => {
    expect(() => loadConfig({ METRICS_PATH: "/healthz" })).toThrow(ConfigError);
  });
});
