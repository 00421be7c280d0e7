import type http from "node:http";

export function send(res: http.ServerResponse, status: number, body: string, headers?: Record<string, string>) {
  res.writeHead(status, { "content-type": "text/plain; charset=utf-8", ...headers });
  res.end(body);
}

export function sendJson(res: http.ServerResponse, status: number, obj: unknown) {
  res.writeHead(status, { "content-type": "application/json; charset=utf-8" });
  res.end(JSON.stringify(obj));
}

export type BodyResult = { ok: true; body: string } | { ok: false; tooLarge: true; bytes: number };

// Reads the whole request body, giving up on content past maxBytes while still draining the socket.
export function readBody(req: http.IncomingMessage, maxBytes: number): Promise<BodyResult> {
  return new Promise((resolve, reject) => {
    const bufs: Buffer[] = [];
    let bytes = 0;
    req.on("data", (chunk: Buffer) => {
      bytes += chunk.length;
      if (bytes <= maxBytes) bufs.push(chunk);
    });
    req.on("end", () => {
      if (bytes > maxBytes) resolve({ ok: false, tooLarge: true, bytes });
      else resolve({ ok: true, body: Buffer.concat(bufs).toString("utf8") });
    });
    req.on("error", reject);
  });
}
