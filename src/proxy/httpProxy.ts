import http from "node:http";
import https from "node:https";
import net from "node:net";
import tls from "node:tls";
import type { Duplex } from "node:stream";
import { URL } from "node:url";
import type { ProxyAddon, RequestFlow, RequestHead, Scheme } from "./addon.ts";
import { tunnel } from "./bytecount.ts";
import { finishBodyCapture, ingestBodyChunk, newBodyAccumulator } from "./capture.ts";
import type { ProxyMetrics } from "../metrics/metrics.ts";
import { statusClass } from "../metrics/metrics.ts";
import type { Logger } from "../logger.ts";
import { errorMessage } from "../errors.ts";

const HOP_BY_HOP = new Set([
  "connection",
  "proxy-connection",
  "keep-alive",
  "transfer-encoding",
  "upgrade",
  "proxy-authenticate",
  "proxy-authorization",
  "te",
  "trailer",
]);

export type ProxyServerOptions = {
  addons: ProxyAddon[];
  metrics: ProxyMetrics;
  logger: Logger;
  // Largest request body kept for addons; bigger bodies reach them truncated.
  captureLimit: number;
  // Certificate presented to clients for intercepted CONNECT hosts; without it CONNECT is always a blind tunnel.
  tls?: { cert: Buffer | string; key: Buffer | string };
  // Extra CA trusted for upstream HTTPS, on top of Node's bundled roots.
  upstreamCa?: Buffer | string;
};

export function sanitizeHeaders(h: http.IncomingHttpHeaders): http.OutgoingHttpHeaders {
  const out: http.OutgoingHttpHeaders = {};
  for (const [k, v] of Object.entries(h)) {
    const lk = k.toLowerCase();
    if (HOP_BY_HOP.has(lk)) continue;
    if (lk === "host") continue;
    if (v === undefined) continue;
    out[k] = v;
  }
  return out;
}

function parseAuthority(authority: string, defaultPort: number): { host: string; port: number } | undefined {
  const m = /^\[?([^\]]*?)\]?(?::(\d+))?$/.exec(authority.trim());
  if (!m || !m[1]) return undefined;
  const port = m[2] ? Number(m[2]) : defaultPort;
  if (!Number.isFinite(port) || port <= 0 || port > 65535) return undefined;
  return { host: m[1], port };
}

function resolveTarget(scheme: Scheme, req: http.IncomingMessage, fallback?: { host: string; port: number }): URL | undefined {
  const rawUrl = req.url ?? "";
  try {
    if (scheme === "http" && /^https?:\/\//i.test(rawUrl)) return new URL(rawUrl);
    const host = req.headers.host ?? (fallback ? `${fallback.host}:${fallback.port}` : undefined);
    if (!host) return undefined;
    return new URL(`${scheme}://${host}${rawUrl.startsWith("/") ? rawUrl : `/${rawUrl}`}`);
  } catch {
    return undefined;
  }
}

function upstreamRequest(options: https.RequestOptions, onResponse: (res: http.IncomingMessage) => void): http.ClientRequest {
  return options.protocol === "https:" ? https.request(options, onResponse) : http.request(options, onResponse);
}

function safely<T>(logger: Logger, addon: ProxyAddon, hook: string, fn: () => T, fallback: T): T {
  try {
    return fn();
  } catch (e) {
    logger.error({ addon: addon.name, hook, err: errorMessage(e) }, "addon_error");
    return fallback;
  }
}

/**
 * Forward proxy: absolute-form HTTP requests are relayed upstream with their
 * body streamed through unchanged; CONNECT opens a byte tunnel, or, for
 * hosts an addon intercepts when a certificate is configured, terminates TLS
 * and relays the decrypted requests over a fresh TLS connection.
 */
export function createProxyServer(opts: ProxyServerOptions): http.Server {
  const { addons, metrics, logger } = opts;
  const upstreamCa = opts.upstreamCa ? [...tls.rootCertificates, opts.upstreamCa.toString()] : undefined;
  const authorities = new WeakMap<object, { host: string; port: number }>();

  const handle = (scheme: Scheme) => (req: http.IncomingMessage, res: http.ServerResponse) => {
    const started = Date.now();
    const method = (req.method ?? "GET").toUpperCase();
    const target = resolveTarget(scheme, req, authorities.get(req.socket));
    if (!target) {
      res.writeHead(400, { "content-type": "text/plain" });
      res.end("bad request");
      return;
    }
    const upstreamScheme: Scheme = target.protocol === "https:" ? "https" : "http";
    if (target.protocol !== "http:" && target.protocol !== "https:") {
      res.writeHead(400, { "content-type": "text/plain" });
      res.end("unsupported protocol");
      return;
    }

    const head: RequestHead = {
      scheme: upstreamScheme,
      method,
      host: target.hostname.replace(/^\[|\]$/g, ""),
      port: target.port ? Number(target.port) : upstreamScheme === "https" ? 443 : 80,
      path: `${target.pathname}${target.search}`,
      pathname: target.pathname,
      headers: req.headers,
    };

    const interested = addons.filter((a) => safely(logger, a, "matches", () => a.matches(head), false));
    if (interested.length) {
      const acc = newBodyAccumulator(opts.captureLimit);
      req.on("data", (chunk: Buffer) => ingestBodyChunk(acc, chunk));
      req.on("end", () => {
        const flow: RequestFlow = { ...head, ...finishBodyCapture(acc), startedMs: started };
        for (const a of interested) safely(logger, a, "onRequest", () => a.onRequest(flow), undefined);
      });
    }

    const proxyReq = upstreamRequest(
      {
        protocol: `${upstreamScheme}:`,
        hostname: head.host,
        port: head.port,
        method,
        path: head.path,
        servername: upstreamScheme === "https" && !net.isIP(head.host) ? head.host : undefined,
        ca: upstreamScheme === "https" ? upstreamCa : undefined,
        headers: {
          ...sanitizeHeaders(req.headers),
          host: target.host,
        },
      },
      (proxyRes) => {
        const status = proxyRes.statusCode ?? 502;
        res.writeHead(status, proxyRes.statusMessage, sanitizeHeaders(proxyRes.headers));
        proxyRes.pipe(res);
        proxyRes.on("end", () => {
          const labels = { scheme: upstreamScheme, method, status_class: statusClass(status) };
          metrics.requestsTotal.inc(labels, 1);
          metrics.requestDurationSeconds.observe(labels, (Date.now() - started) / 1000);
          logger.debug({ ...labels, host: head.host, path: head.path, status, latency_ms: Date.now() - started }, "proxied");
        });
      }
    );

    proxyReq.on("error", (e) => {
      logger.warn({ host: head.host, port: head.port, err: errorMessage(e) }, "upstream_error");
      if (!res.headersSent) {
        res.writeHead(502, { "content-type": "text/plain" });
        res.end("bad gateway");
      } else {
        res.destroy();
      }
    });

    res.on("close", () => {
      if (!res.writableFinished) proxyReq.destroy();
    });

    req.pipe(proxyReq);
  };

  const server = http.createServer(handle("http"));
  const secureContext = opts.tls ? tls.createSecureContext({ cert: opts.tls.cert, key: opts.tls.key }) : undefined;
  const inner = http.createServer(handle("https"));

  const intercept = (clientSocket: Duplex, head: Buffer, authority: { host: string; port: number }) => {
    clientSocket.write("HTTP/1.1 200 Connection Established\r\n\r\n");
    if (head.length) clientSocket.unshift(head);
    const tlsSocket = new tls.TLSSocket(clientSocket, { isServer: true, secureContext });
    authorities.set(tlsSocket, authority);
    tlsSocket.on("error", (e) => {
      logger.debug({ host: authority.host, err: errorMessage(e) }, "intercept_tls_error");
      tlsSocket.destroy();
    });
    inner.emit("connection", tlsSocket);
  };

  server.on("connect", (req: http.IncomingMessage, clientSocket: Duplex, head: Buffer) => {
    const authority = parseAuthority(req.url ?? "", 443);
    if (!authority) {
      clientSocket.end("HTTP/1.1 400 Bad Request\r\n\r\n");
      return;
    }
    clientSocket.on("error", (e) => {
      logger.debug({ host: authority.host, err: errorMessage(e) }, "client_socket_error");
    });

    const wanted = secureContext != null && addons.some((a) =>
      safely(logger, a, "interceptsHost", () => a.interceptsHost(authority.host, authority.port), false)
    );
    if (wanted) {
      metrics.connectTotal.inc({ mode: "intercept" }, 1);
      intercept(clientSocket, head, authority);
      return;
    }

    metrics.connectTotal.inc({ mode: "tunnel" }, 1);
    let established = false;
    const serverSocket = net.connect(authority.port, authority.host, () => {
      established = true;
      clientSocket.write("HTTP/1.1 200 Connection Established\r\n\r\n");
      if (head.length) serverSocket.write(head);
      const count = tunnel(clientSocket, serverSocket);
      serverSocket.once("close", () => {
        metrics.bytesTotal.inc({ direction: "out" }, count.outBytes);
        metrics.bytesTotal.inc({ direction: "in" }, count.inBytes);
      });
    });

    serverSocket.on("error", (e) => {
      logger.debug({ host: authority.host, port: authority.port, err: errorMessage(e) }, "tunnel_error");
      if (!established && clientSocket.writable) clientSocket.end("HTTP/1.1 502 Bad Gateway\r\n\r\n");
      else clientSocket.destroy();
    });
    clientSocket.on("close", () => serverSocket.destroy());
    // A clean upstream close lets the piped end() flush what is still buffered for the client.
    serverSocket.on("close", (hadError) => {
      if (hadError) clientSocket.destroy();
      else clientSocket.end();
    });
  });

  return server;
}
