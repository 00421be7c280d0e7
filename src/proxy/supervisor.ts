import { spawn, type ChildProcess } from "node:child_process";
import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { once } from "node:events";
import type { TargetSpec } from "../config.ts";
import { DEFAULT_HEALTH_PORT, DEFAULT_PROXY_PORT, proxyEnv } from "../config.ts";
import { SetupError, errorMessage } from "../errors.ts";
import type { Logger } from "../logger.ts";
import { createLogger } from "../logger.ts";
import { isListening } from "../util/net.ts";
import { sleep } from "../util/time.ts";

export type SupervisorOptions = {
  host?: string;
  port?: number;
  healthPort?: number;
  logDir?: string;
  // Program and arguments that start the proxy; defaults to this package's proxy entry run through tsx.
  command?: string;
  args?: string[];
  extraArgs?: string[];
  // Certificate the proxy presents for intercepted HTTPS hosts; without it CONNECT is tunnelled blind.
  tls?: { certFile: string; keyFile: string; upstreamCaFile?: string };
  startTimeoutMs?: number;
  stopTimeoutMs?: number;
  env?: Record<string, string | undefined>;
  logger?: Logger;
};

export type ProxyHandle = {
  readonly host: string;
  readonly port: number;
  readonly pid: number;
  readonly logFile: string;
  readonly pidFile: string;
  readonly child: ChildProcess;
};

const BLOCKED_PREFIXES = ["--listen-", "--web-", "--mode"];
const BLOCKED_EXACT = new Set(["--listen-host", "--listen-port", "-p", "--port", "--host", "--mode", "--web-host", "--web-port"]);
const SECRET_MARKERS = ["KEY", "TOKEN", "SECRET", "PASSWORD", "AWS", "AZURE", "GCP", "GOOGLE_APPLICATION_CREDENTIALS"];

// Drops flags that would move the proxy off the address the supervisor manages, along with their values.
export function filterProxyArgs(args: readonly string[]): string[] {
  const out: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const a = args[i].trim();
    const blocked = BLOCKED_EXACT.has(a) || BLOCKED_PREFIXES.some((p) => a.startsWith(p));
    if (!blocked) {
      out.push(a);
      continue;
    }
    const next = args[i + 1];
    if (!a.includes("=") && next != null && !next.startsWith("-")) i++;
  }
  return out;
}

export function sanitizeEnv(env: Record<string, string | undefined>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(env)) {
    if (v == null) continue;
    const upper = k.toUpperCase();
    if (SECRET_MARKERS.some((m) => upper.includes(m))) continue;
    out[k] = v;
  }
  return out;
}

function defaultArgs(): string[] {
  return ["--import", "tsx", fileURLToPath(new URL("./main.ts", import.meta.url))];
}

function alive(child: ChildProcess): boolean {
  return child.exitCode == null && child.signalCode == null;
}

function stamp(): string {
  return new Date().toISOString().replace(/[:.]/g, "-");
}

/**
 * Starts and stops the proxy as a separate process. A proxy that does not
 * come up within the start timeout is a fatal {@link SetupError}; there is
 * no retry.
 */
export class ProxySupervisor {
  private readonly host: string;
  private readonly port: number;
  private readonly healthPort: number;
  private readonly logDir: string;
  private readonly command: string;
  private readonly args: string[];
  private readonly tls?: SupervisorOptions["tls"];
  private readonly startTimeoutMs: number;
  private readonly stopTimeoutMs: number;
  private readonly env: Record<string, string | undefined>;
  private readonly logger: Logger;

  constructor(opts: SupervisorOptions = {}) {
    this.host = opts.host ?? "127.0.0.1";
    this.port = opts.port ?? DEFAULT_PROXY_PORT;
    this.healthPort = opts.healthPort ?? DEFAULT_HEALTH_PORT;
    this.logDir = opts.logDir ?? path.join("artifacts", "proxy");
    this.command = opts.command ?? process.execPath;
    this.args = [...(opts.args ?? defaultArgs()), ...filterProxyArgs(opts.extraArgs ?? [])];
    this.tls = opts.tls;
    this.startTimeoutMs = opts.startTimeoutMs ?? 5000;
    this.stopTimeoutMs = opts.stopTimeoutMs ?? 2000;
    this.env = opts.env ?? process.env;
    this.logger = opts.logger ?? createLogger({ service: "supervisor" });
  }

  async start(target: TargetSpec, collectorUrl: string): Promise<ProxyHandle> {
    if (await isListening(this.host, this.port)) {
      throw new SetupError(`proxy port ${this.host}:${this.port} is already in use`);
    }

    fs.mkdirSync(this.logDir, { recursive: true });
    const logFile = path.join(this.logDir, `proxy_${stamp()}.log`);
    const pidFile = path.join(this.logDir, "proxy.pid");
    const fd = fs.openSync(logFile, "a");

    let child: ChildProcess;
    try {
      child = spawn(this.command, this.args, {
        detached: true,
        stdio: ["ignore", fd, fd],
        // Set after sanitizing: PROXY_TLS_KEY_FILE would otherwise be dropped as a secret.
        env: {
          ...sanitizeEnv(this.env),
          ...proxyEnv(
            {
              host: this.host,
              port: this.port,
              healthPort: this.healthPort,
              tlsCertFile: this.tls?.certFile,
              tlsKeyFile: this.tls?.keyFile,
              upstreamCaFile: this.tls?.upstreamCaFile,
            },
            target,
            collectorUrl
          ),
        },
      });
    } finally {
      fs.closeSync(fd);
    }

    const spawnError = new Promise<Error>((resolve) => child.once("error", resolve));
    const pid = child.pid;
    if (pid == null) {
      const err = await spawnError;
      throw new SetupError(`could not start ${this.command}: ${err.message}`, { cause: err });
    }
    fs.writeFileSync(pidFile, String(pid), "utf8");

    const handle: ProxyHandle = { host: this.host, port: this.port, pid, logFile, pidFile, child };
    this.logger.info({ pid, command: [this.command, ...this.args].join(" "), logFile }, "proxy_spawned");

    const deadline = Date.now() + this.startTimeoutMs;
    for (;;) {
      if (!alive(child)) {
        this.removePidFile(pidFile);
        throw new SetupError(`proxy exited during startup (code ${child.exitCode ?? child.signalCode}); see log ${logFile}`);
      }
      if (await isListening(this.host, this.port, 300)) break;
      if (Date.now() >= deadline) {
        await this.stop(handle);
        throw new SetupError(`proxy did not listen on ${this.host}:${this.port} within ${this.startTimeoutMs}ms; see log ${logFile}`);
      }
      await sleep(100);
    }

    this.logger.info({ host: this.host, port: this.port, pid }, "proxy_listening");
    return handle;
  }

  async isHealthy(handle: ProxyHandle): Promise<boolean> {
    if (!alive(handle.child)) return false;
    return isListening(handle.host, handle.port);
  }

  async stop(handle: ProxyHandle): Promise<void> {
    const { child } = handle;
    if (alive(child)) {
      this.logger.info({ pid: handle.pid }, "proxy_stopping");
      const exited = once(child, "exit");
      this.signal(handle.pid, "SIGTERM");
      let timer: NodeJS.Timeout | undefined;
      const timedOut = new Promise<boolean>((resolve) => {
        timer = setTimeout(() => resolve(false), this.stopTimeoutMs);
      });
      const stopped = await Promise.race([exited.then(() => true), timedOut]);
      clearTimeout(timer);
      if (!stopped && alive(child)) {
        this.logger.warn({ pid: handle.pid }, "proxy ignored SIGTERM; sending SIGKILL");
        this.signal(handle.pid, "SIGKILL");
        await exited;
      }
    }
    this.removePidFile(handle.pidFile);
  }

  private signal(pid: number, sig: NodeJS.Signals) {
    try {
      // Negative pid: the whole process group started with detached.
      process.kill(-pid, sig);
    } catch (e) {
      this.logger.debug({ pid, sig, err: errorMessage(e) }, "group kill failed; signalling process");
      try {
        process.kill(pid, sig);
      } catch (e2) {
        this.logger.debug({ pid, sig, err: errorMessage(e2) }, "process already gone");
      }
    }
  }

  private removePidFile(pidFile: string) {
    fs.rmSync(pidFile, { force: true });
  }
}
