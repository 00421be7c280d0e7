import fs from "node:fs";
import net from "node:net";
import os from "node:os";
import path from "node:path";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { ProxySupervisor, filterProxyArgs, sanitizeEnv } from "../src/proxy/supervisor.ts";
import type { ProxyHandle, SupervisorOptions } from "../src/proxy/supervisor.ts";
import { CollectorServer } from "../src/collector/server.ts";
import { SetupError } from "../src/errors.ts";
import { getFreePort } from "../src/util/net.ts";
import { eventually, request, startUpstream } from "./helpers.ts";

// Stand-in proxy: listens where the supervisor says and logs what it was given.
const FAKE_PROXY = `
const http = require("node:http");
console.log(JSON.stringify({ target: process.env.MIRROR_TARGET_HOST, token: process.env.API_TOKEN ?? null, keep: process.env.KEEP }));
const server = http.createServer((req, res) => res.end("ok"));
server.listen(Number(process.env.PROXY_PORT), process.env.PROXY_HOST);
process.on("SIGTERM", () => server.close(() => process.exit(0)));
`;

const TLS_PROXY = `
const http = require("node:http");
console.log(JSON.stringify({ cert: process.env.PROXY_TLS_CERT_FILE, key: process.env.PROXY_TLS_KEY_FILE, ca: process.env.PROXY_UPSTREAM_CA_FILE }));
const server = http.createServer((req, res) => res.end("ok"));
server.listen(Number(process.env.PROXY_PORT), process.env.PROXY_HOST);
process.on("SIGTERM", () => server.close(() => process.exit(0)));
`;

const target = { host: "127.0.0.1", path: "/batch" };
const collectorUrl = "http://127.0.0.1:1/event";

let logDir: string;
let port: number;
let handles: Array<{ sup: ProxySupervisor; handle: ProxyHandle }>;

function supervisor(opts: Partial<SupervisorOptions> = {}): ProxySupervisor {
  return new ProxySupervisor({ port, healthPort: 0, logDir, env: {}, startTimeoutMs: 5000, ...opts });
}

async function start(sup: ProxySupervisor): Promise<ProxyHandle> {
  const handle = await sup.start(target, collectorUrl);
  handles.push({ sup, handle });
  return handle;
}

beforeEach(async () => {
  logDir = fs.mkdtempSync(path.join(os.tmpdir(), "eventtap-sup-"));
  port = await getFreePort();
  handles = [];
});

afterEach(async () => {
  await Promise.all(handles.map(({ sup, handle }) => sup.stop(handle)));
  fs.rmSync(logDir, { recursive: true, force: true });
});

describe("filterProxyArgs / sanitizeEnv", () => {
  it("drops flags that move the listener", () => {
    expect(filterProxyArgs(["--listen-port", "8080", "--set", "x=1", "--mode=regular", "-p", "9", "--verbose"])).toEqual([
      "--set",
      "x=1",
      "--verbose",
    ]);
  });

  it("drops secrets and unset values", () => {
    expect(sanitizeEnv({ AWS_REGION: "eu", MY_TOKEN: "test-secret", db_password: "x", HOME: "/home/t", EMPTY: undefined })).toEqual({
      HOME: "/home/t",
    });
  });
});

describe("ProxySupervisor", () => {
  it("starts, reports health and stops", async () => {
    const sup = supervisor({ args: ["-e", FAKE_PROXY], env: { API_TOKEN: "test-secret", KEEP: "1" } });
    const handle = await start(sup);

    expect(handle.port).toBe(port);
    expect(fs.readFileSync(handle.pidFile, "utf8")).toBe(String(handle.pid));
    expect(await sup.isHealthy(handle)).toBe(true);

    await sup.stop(handle);
    expect(await sup.isHealthy(handle)).toBe(false);
    expect(fs.existsSync(handle.pidFile)).toBe(false);
    expect(handle.child.exitCode).toBe(0);
    expect(fs.readFileSync(handle.logFile, "utf8").trim()).toBe('{"target":"127.0.0.1","token":null,"keep":"1"}');
  });

  it("hands the TLS files to the proxy", async () => {
    const sup = supervisor({
      args: ["-e", TLS_PROXY],
      env: { PROXY_TLS_KEY_FILE: "/stale/key.pem" },
      tls: { certFile: "/certs/proxy.pem", keyFile: "/certs/proxy-key.pem", upstreamCaFile: "/certs/ca.pem" },
    });
    const handle = await start(sup);
    await sup.stop(handle);
    expect(fs.readFileSync(handle.logFile, "utf8").trim()).toBe(
      '{"cert":"/certs/proxy.pem","key":"/certs/proxy-key.pem","ca":"/certs/ca.pem"}'
    );
  });

  it("kills a proxy that ignores SIGTERM", async () => {
    const stubborn = `${FAKE_PROXY}\nprocess.removeAllListeners("SIGTERM");\nprocess.on("SIGTERM", () => {});`;
    const sup = supervisor({ args: ["-e", stubborn], stopTimeoutMs: 200 });
    const handle = await start(sup);
    await sup.stop(handle);
    expect(handle.child.signalCode).toBe("SIGKILL");
  });

  it("fails setup when the proxy exits early", async () => {
    const sup = supervisor({ args: ["-e", "process.exit(3)"] });
    const err = await sup.start(target, collectorUrl).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(SetupError);
    expect(err instanceof Error ? err.message : "").toContain("proxy exited during startup (code 3)");
    expect(fs.existsSync(path.join(logDir, "proxy.pid"))).toBe(false);
  });

  it("fails setup when the proxy never listens", async () => {
    const sup = supervisor({ args: ["-e", "setInterval(() => {}, 1000)"], startTimeoutMs: 300 });
    const err = await sup.start(target, collectorUrl).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(SetupError);
    expect(err instanceof Error ? err.message : "").toContain(`proxy did not listen on 127.0.0.1:${port} within 300ms`);
  });

  it("refuses a port that is already taken", async () => {
    const squatter = net.createServer();
    await new Promise<void>((resolve) => squatter.listen(port, "127.0.0.1", resolve));
    try {
      const sup = supervisor({ args: ["-e", FAKE_PROXY] });
      await expect(sup.start(target, collectorUrl)).rejects.toThrow(`proxy port 127.0.0.1:${port} is already in use`);
    } finally {
      await new Promise<void>((resolve) => squatter.close(() => resolve()));
    }
  });

  it("runs the real proxy end to end", async () => {
    const collector = new CollectorServer({ host: "127.0.0.1", port: 0 });
    await collector.start();
    const upstream = await startUpstream();
    try {
      const sup = new ProxySupervisor({ port, healthPort: 0, logDir, startTimeoutMs: 10_000 });
      const handle = await sup.start({ host: "127.0.0.1", port: upstream.port, path: "/batch" }, collector.eventUrl);
      handles.push({ sup, handle });

      const res = await request(`http://127.0.0.1:${upstream.port}/batch`, {
        method: "POST",
        body: '[{"name":"app_open"},{"name":"screen_view","screen":"home"}]',
        headers: { "content-type": "application/json" },
        proxyPort: port,
      });
      expect(res.status).toBe(201);
      await eventually(() => collector.query().length === 2, 5000);
      expect(collector.query().map((e) => e.name)).toEqual(["app_open", "screen_view"]);
    } finally {
      await upstream.close();
      await collector.stop();
    }
  });
});
