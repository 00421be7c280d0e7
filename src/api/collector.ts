import http from "node:http";
import { URL } from "node:url";
import type { CollectorConfig } from "../config.ts";
import type { EventStore } from "../events/store.ts";
import { parseBatch } from "../events/ingest.ts";
import { compileFilter, isNameMatchMode } from "../filter.ts";
import type { EventFilter } from "../filter.ts";
import type { CollectorMetrics } from "../metrics/metrics.ts";
import type { Logger } from "../logger.ts";
import { errorMessage } from "../errors.ts";
import { parseDurationMs, parseTimestampMs } from "../util/time.ts";
import { readBody, send, sendJson } from "./http.ts";

export type CollectorDeps = {
  cfg: CollectorConfig;
  store: EventStore;
  metrics: CollectorMetrics;
  logger: Logger;
};

function parseSinceCursorOrDuration(since: string | null): { sinceCursor?: number; fromMs?: number } {
  if (!since) return {};
  const n = Number(since);
  if (Number.isFinite(n) && String(Math.floor(n)) === since.trim()) return { sinceCursor: Math.max(1, Math.floor(n)) };
  const dur = parseDurationMs(since);
  if (dur != null) return { fromMs: Date.now() - dur };
  return {};
}

// Query-string form of an EventFilter: name, name_mode, from, to.
export function filterFromSearchParams(params: URLSearchParams): EventFilter | { error: string } {
  const f: EventFilter = {};
  const name = params.get("name");
  if (name != null && name !== "") f.name = name;
  const mode = params.get("name_mode");
  if (mode != null && mode !== "") {
    if (!isNameMatchMode(mode)) return { error: `invalid name_mode: ${mode}` };
    f.nameMode = mode;
  }
  const from = parseTimestampMs(params.get("from"));
  const to = parseTimestampMs(params.get("to"));
  if (from != null) f.fromMs = from;
  if (to != null) f.toMs = to;
  return f;
}

async function handleIngest(deps: CollectorDeps, req: http.IncomingMessage, res: http.ServerResponse) {
  const { cfg, store, metrics, logger } = deps;
  const body = await readBody(req, cfg.maxBodyBytes);
  if (!body.ok) {
    metrics.batchesTotal.inc({ result: "rejected" });
    logger.warn({ bytes: body.bytes, limit: cfg.maxBodyBytes }, "batch_rejected_too_large");
    return sendJson(res, 413, { error: `body exceeds ${cfg.maxBodyBytes} bytes` });
  }

  const parsed = parseBatch(body.body, cfg);
  if (!parsed.ok) {
    metrics.batchesTotal.inc({ result: "rejected" });
    logger.warn({ error: parsed.error }, "batch_rejected");
    return sendJson(res, 400, { error: parsed.error });
  }

  for (const s of parsed.skipped) {
    logger.warn({ index: s.index, reason: s.reason }, "element_skipped");
  }
  metrics.elementsSkippedTotal.inc(parsed.skipped.length);

  const remoteAddress = `${req.socket.remoteAddress ?? "unknown"}:${req.socket.remotePort ?? 0}`;
  const stored = store.append({ remoteAddress, elements: parsed.elements });
  metrics.batchesTotal.inc({ result: "stored" });
  metrics.eventsStoredTotal.inc(stored.length);
  logger.info(
    { count: stored.length, skipped: parsed.skipped.length, batch: stored[0]?.sourceBatchId, names: stored.map((e) => e.name) },
    "batch_stored"
  );
  sendJson(res, 200, { stored: stored.length });
}

function handleEvents(deps: CollectorDeps, url: URL, res: http.ServerResponse) {
  const filter = filterFromSearchParams(url.searchParams);
  if ("error" in filter) return sendJson(res, 400, { error: filter.error });
  const rawLimit = Number(url.searchParams.get("limit") ?? "");
  // Missing or unusable limits fall back to the default page size.
  const limit = Number.isFinite(rawLimit) && rawLimit >= 1 ? Math.min(50_000, Math.floor(rawLimit)) : 1000;
  const since = parseSinceCursorOrDuration(url.searchParams.get("since"));
  const fromMs = filter.fromMs ?? since.fromMs;
  const result = deps.store.query({
    sinceCursor: since.sinceCursor,
    limit,
    matches: compileFilter({ ...filter, fromMs }),
  });
  sendJson(res, 200, {
    events: result.events,
    next_cursor: result.nextCursor,
    total: deps.store.size(),
  });
}

export function createCollectorServer(deps: CollectorDeps): http.Server {
  const { store, metrics, logger } = deps;

  const server = http.createServer((req, res) => {
    let url: URL;
    try {
      // A fixed base: the Host header is client input.
      url = new URL(req.url ?? "/", "http://localhost");
    } catch {
      return send(res, 400, "bad request\n");
    }
    const path = url.pathname;
    const method = (req.method ?? "GET").toUpperCase();

    const route = async () => {
      if (path === "/health") {
        if (method !== "GET" && method !== "HEAD") return send(res, 405, "method not allowed\n");
        return send(res, 200, "OK");
      }

      if (path === "/event") {
        if (method !== "POST") return send(res, 405, "method not allowed\n");
        return handleIngest(deps, req, res);
      }

      if (path === "/reset") {
        if (method !== "GET" && method !== "DELETE") return send(res, 405, "method not allowed\n");
        const cleared = store.clear();
        logger.info({ cleared }, "store_reset");
        return sendJson(res, 200, { cleared });
      }

      if (path === "/events") {
        if (method !== "GET") return send(res, 405, "method not allowed\n");
        return handleEvents(deps, url, res);
      }

      if (path === "/metrics") {
        res.writeHead(200, { "content-type": metrics.registry.contentType });
        res.end(await metrics.registry.metrics());
        return;
      }

      send(res, 404, "not found\n");
    };

    route().catch((e: unknown) => {
      logger.error({ err: errorMessage(e), path, method }, "collector_handler_error");
      if (!res.headersSent) send(res, 500, "internal server error\n");
      else res.destroy();
    });
  });

  return server;
}
