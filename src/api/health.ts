import http from "node:http";
import { URL } from "node:url";
import type { Registry } from "prom-client";
import type { Logger } from "../logger.ts";
import { errorMessage } from "../errors.ts";
import { send, sendJson } from "./http.ts";

export type HealthDeps = {
  registry: Registry;
  logger: Logger;
  ready: () => boolean;
  describe: () => Record<string, unknown>;
};

// Operational endpoints of the proxy process: liveness, readiness and metrics.
export function createHealthServer(deps: HealthDeps): http.Server {
  return http.createServer((req, res) => {
    let url: URL;
    try {
      // A fixed base: the Host header is client input.
      url = new URL(req.url ?? "/", "http://localhost");
    } catch {
      return send(res, 400, "bad request\n");
    }
    const path = url.pathname;

    if (path === "/healthz") {
      return sendJson(res, 200, { status: deps.ready() ? "ok" : "starting", pid: process.pid, ts: new Date().toISOString(), ...deps.describe() });
    }
    if (path === "/readyz") return send(res, deps.ready() ? 200 : 503, deps.ready() ? "ready\n" : "not ready\n");

    if (path === "/metrics") {
      deps.registry
        .metrics()
        .then((body) => {
          res.writeHead(200, { "content-type": deps.registry.contentType });
          res.end(body);
        })
        .catch((e: unknown) => {
          deps.logger.error({ err: errorMessage(e) }, "metrics_render_failed");
          send(res, 500, "internal server error\n");
        });
      return;
    }

    send(res, 404, "not found\n");
  });
}
