/**
 * Metrics Module
 *
 * Bridges MetricCollector implementations onto a prom-client registry.
 */

export { CollectorRegistry } from "./collector-registry.js";
