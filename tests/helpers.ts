import http from "node:http";
import net from "node:net";
import type { AddressInfo } from "node:net";

export type Upstream = {
  server: http.Server;
  port: number;
  requests: Array<{ method: string; url: string; body: string; headers: http.IncomingHttpHeaders }>;
  close: () => Promise<void>;
};

export type SimpleResponse = {
  status: number;
  headers: http.IncomingHttpHeaders;
  body: string;
};

function portOf(server: http.Server): number {
  const addr = server.address();
  if (!addr || typeof addr === "string") throw new Error("server is not listening on a TCP port");
  return (addr satisfies AddressInfo).port;
}

export function listen(server: http.Server): Promise<number> {
  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(0, "127.0.0.1", () => resolve(portOf(server)));
  });
}

export function closeServer(server: http.Server): Promise<void> {
  return new Promise((resolve) => {
    server.close(() => resolve());
    server.closeAllConnections();
  });
}

// Origin server answering every request with a fixed body and echoing nothing of the request back.
export async function startUpstream(): Promise<Upstream> {
  const requests: Upstream["requests"] = [];
  const server = http.createServer((req, res) => {
    const bufs: Buffer[] = [];
    req.on("data", (c: Buffer) => bufs.push(c));
    req.on("end", () => {
      requests.push({ method: req.method ?? "", url: req.url ?? "", body: Buffer.concat(bufs).toString("utf8"), headers: req.headers });
      res.writeHead(201, { "content-type": "application/json", "x-upstream": "yes", "set-cookie": ["a=1", "b=2"] });
      res.end(JSON.stringify({ accepted: true, path: req.url }));
    });
  });
  const port = await listen(server);
  return { server, port, requests, close: () => closeServer(server) };
}

// Sends a request either straight to `url` or through the proxy as an absolute-form request.
export function request(
  url: string,
  opts: { method?: string; body?: string; headers?: Record<string, string>; proxyPort?: number } = {}
): Promise<SimpleResponse> {
  const target = new URL(url);
  return new Promise((resolve, reject) => {
    const req = http.request(
      {
        host: "127.0.0.1",
        port: opts.proxyPort ?? Number(target.port),
        method: opts.method ?? "GET",
        path: opts.proxyPort ? url : `${target.pathname}${target.search}`,
        headers: { host: target.host, connection: "close", ...opts.headers },
      },
      (res) => {
        const bufs: Buffer[] = [];
        res.on("data", (c: Buffer) => bufs.push(c));
        res.on("end", () => resolve({ status: res.statusCode ?? 0, headers: res.headers, body: Buffer.concat(bufs).toString("utf8") }));
        res.on("error", reject);
      }
    );
    req.on("error", reject);
    req.end(opts.body);
  });
}

// Writes a raw request so headers fetch would normalise reach the server as sent.
export function rawRequest(port: number, text: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const socket = net.connect(port, "127.0.0.1", () => socket.write(text));
    const bufs: Buffer[] = [];
    socket.on("data", (c: Buffer) => bufs.push(c));
    socket.on("end", () => resolve(Buffer.concat(bufs).toString("utf8")));
    socket.on("error", reject);
  });
}

export async function eventually(check: () => boolean | Promise<boolean>, timeoutMs = 3000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!(await check())) {
    if (Date.now() > deadline) throw new Error(`condition not met within ${timeoutMs}ms`);
    await new Promise((r) => setTimeout(r, 20));
  }
}
