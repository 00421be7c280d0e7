import type http from "node:http";

export type Scheme = "http" | "https";

// What an addon sees before the body has been read.
export type RequestHead = {
  scheme: Scheme;
  method: string;
  host: string;
  port: number;
  // pathname plus query string, as sent upstream
  path: string;
  pathname: string;
  headers: http.IncomingHttpHeaders;
};

export type RequestFlow = RequestHead & {
  body: Buffer;
  // false when the body outgrew the capture limit and `body` holds only a prefix
  complete: boolean;
  bodyBytes: number;
  startedMs: number;
};

/**
 * Hook run inside the proxy for each request.
 *
 * `matches` is checked when the request head arrives; only then does the
 * proxy keep a copy of the body. `onRequest` runs once the client has sent
 * the whole body and must return without waiting on I/O. Exceptions from
 * either method are logged and the request carries on untouched.
 */
export interface ProxyAddon {
  readonly name: string;
  // Asked on CONNECT: should TLS to this host be terminated so matches() can see its requests?
  interceptsHost(host: string, port: number): boolean;
  matches(head: RequestHead): boolean;
  onRequest(flow: RequestFlow): void;
}
