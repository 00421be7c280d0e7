import { Counter, Histogram, Registry, collectDefaultMetrics } from "prom-client";

export type CollectorMetrics = {
  registry: Registry;
  batchesTotal: Counter;
  eventsStoredTotal: Counter;
  elementsSkippedTotal: Counter;
};

export type ProxyMetrics = {
  registry: Registry;
  requestsTotal: Counter;
  requestDurationSeconds: Histogram;
  connectTotal: Counter;
  bytesTotal: Counter;
  mirrorForwardsTotal: Counter;
};

// Each server gets its own registry so a collector and a proxy can share a process (tests do).
export function createCollectorMetrics(opts: { defaults?: boolean } = {}): CollectorMetrics {
  const registry = new Registry();
  if (opts.defaults) collectDefaultMetrics({ register: registry });

  const batchesTotal = new Counter({
    name: "eventtap_batches_total",
    help: "Batches received on POST /event, by result (stored, rejected).",
    labelNames: ["result"],
    registers: [registry],
  });

  const eventsStoredTotal = new Counter({
    name: "eventtap_events_stored_total",
    help: "Event records appended to the store.",
    registers: [registry],
  });

  const elementsSkippedTotal = new Counter({
    name: "eventtap_elements_skipped_total",
    help: "Batch elements skipped because they were not JSON objects.",
    registers: [registry],
  });

  return { registry, batchesTotal, eventsStoredTotal, elementsSkippedTotal };
}

export function createProxyMetrics(opts: { defaults?: boolean } = {}): ProxyMetrics {
  const registry = new Registry();
  if (opts.defaults) collectDefaultMetrics({ register: registry });

  const requestsTotal = new Counter({
    name: "eventtap_proxy_requests_total",
    help: "Requests forwarded by the proxy.",
    labelNames: ["scheme", "method", "status_class"],
    registers: [registry],
  });

  const requestDurationSeconds = new Histogram({
    name: "eventtap_proxy_request_duration_seconds",
    help: "Observed proxied request duration in seconds.",
    labelNames: ["scheme", "method", "status_class"],
    registers: [registry],
  });

  const connectTotal = new Counter({
    name: "eventtap_proxy_connect_total",
    help: "CONNECT requests, by handling mode (tunnel, intercept).",
    labelNames: ["mode"],
    registers: [registry],
  });

  const bytesTotal = new Counter({
    name: "eventtap_proxy_bytes_total",
    help: "Tunnelled bytes by direction (in=dst->client, out=client->dst).",
    labelNames: ["direction"],
    registers: [registry],
  });

  const mirrorForwardsTotal = new Counter({
    name: "eventtap_mirror_forwards_total",
    help: "Mirror forwards to the collector, by result (ok, http_error, error, skipped).",
    labelNames: ["result"],
    registers: [registry],
  });

  return { registry, requestsTotal, requestDurationSeconds, connectTotal, bytesTotal, mirrorForwardsTotal };
}

export function statusClass(status: number | undefined): string {
  if (!status || !Number.isFinite(status)) return "0xx";
  const c = Math.floor(status / 100);
  return `${c}xx`;
}
