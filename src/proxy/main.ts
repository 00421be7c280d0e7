import http from "node:http";
import { readFileSync } from "node:fs";
import { loadProxyConfig } from "../config.ts";
import { createProxyMetrics } from "../metrics/metrics.ts";
import { createLogger } from "../logger.ts";
import { createHealthServer } from "../api/health.ts";
import { describeTarget } from "./target.ts";
import { MirrorAddon } from "./mirror.ts";
import { createProxyServer } from "./httpProxy.ts";

const cfg = loadProxyConfig();
const logger = createLogger({ service: "proxy" });
const metrics = createProxyMetrics({ defaults: true });

const mirror = new MirrorAddon({ ...cfg.mirror, logger: logger.child({ component: "mirror" }), metrics });
const tls =
  cfg.tlsCertFile && cfg.tlsKeyFile
    ? { cert: readFileSync(cfg.tlsCertFile), key: readFileSync(cfg.tlsKeyFile) }
    : undefined;

const upstreamCa = cfg.upstreamCaFile ? readFileSync(cfg.upstreamCaFile) : undefined;

let proxyReady = false;
const proxy = createProxyServer({ addons: [mirror], metrics, logger, captureLimit: cfg.mirror.maxBodyBytes, tls, upstreamCa });
const health = cfg.healthPort > 0
  ? createHealthServer({
      registry: metrics.registry,
      logger,
      ready: () => proxyReady,
      describe: () => ({ host: cfg.host, port: cfg.port, mirror: mirror.describe(), pending_forwards: mirror.pending }),
    })
  : undefined;

proxy.on("error", (e) => {
  logger.fatal({ err: e, host: cfg.host, port: cfg.port }, "proxy_listen_failed");
  process.exit(1);
});

proxy.listen(cfg.port, cfg.host, () => {
  proxyReady = true;
  logger.info(
    { host: cfg.host, port: cfg.port, target: describeTarget(cfg.mirror.target), mirror: cfg.mirror.enabled, intercept_tls: tls != null },
    "proxy_started"
  );
});

if (health) {
  // A busy health port only costs the operational endpoint.
  health.on("error", (e) => logger.warn({ err: e, port: cfg.healthPort }, "health_listen_failed"));
  health.listen(cfg.healthPort, "127.0.0.1", () => logger.info({ port: cfg.healthPort }, "health_started"));
}

function close(server: http.Server, name: string): Promise<void> {
  return new Promise((resolve) => {
    server.close(() => resolve());
    server.closeAllConnections();
    setTimeout(() => {
      logger.warn({ server: name }, "force exit waiting for close");
      resolve();
    }, 5000).unref();
  });
}

let shuttingDown = false;
async function shutdown(signal: NodeJS.Signals) {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info({ signal }, "shutdown_signal");
  const servers = [close(proxy, "proxy")];
  if (health?.listening) servers.push(close(health, "health"));
  await Promise.all(servers);
  await mirror.drain();
  process.exit(0);
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    void shutdown(signal);
  });
}
