export type CollectorConfig = {
  host: string;
  port: number;
  namePath: string;
  nameFallbackPath?: string;
  batchField: string;
  maxBodyBytes: number;
};

export type TargetSpec = {
  host: string;
  port?: number;
  path: string;
};

export type MirrorConfig = {
  enabled: boolean;
  target: TargetSpec;
  collectorUrl: string;
  timeoutMs: number;
  maxBodyBytes: number;
};

export type ProxyConfig = {
  host: string;
  port: number;
  healthPort: number;
  tlsCertFile?: string;
  tlsKeyFile?: string;
  // Extra CA trusted when the proxy opens TLS to the real upstream.
  upstreamCaFile?: string;
  mirror: MirrorConfig;
};

export const DEFAULT_COLLECTOR_PORT = 8080;
export const DEFAULT_PROXY_PORT = 9090;
export const DEFAULT_HEALTH_PORT = 8079;
export const DEFAULT_COLLECTOR_URL = `http://127.0.0.1:${DEFAULT_COLLECTOR_PORT}/event`;

type Env = Record<string, string | undefined>;

function envBool(env: Env, name: string, def: boolean): boolean {
  const v = env[name];
  if (v == null || v === "") return def;
  return ["1", "true", "yes", "y", "on"].includes(String(v).toLowerCase());
}

function envNum(env: Env, name: string, def: number): number {
  const v = env[name];
  if (v == null || v === "") return def;
  const n = Number(v);
  return Number.isFinite(n) ? n : def;
}

function envOptNum(env: Env, name: string): number | undefined {
  const v = env[name];
  if (v == null || v === "") return undefined;
  const n = Number(v);
  return Number.isFinite(n) ? n : undefined;
}

function envStr(env: Env, name: string, def: string): string {
  const v = env[name];
  return v == null || v === "" ? def : String(v);
}

function envOptStr(env: Env, name: string): string | undefined {
  const v = env[name];
  return v == null || v === "" ? undefined : String(v);
}

function port(n: number, def: number): number {
  const p = Math.floor(n);
  return p >= 0 && p <= 65535 ? p : def;
}

export function loadCollectorConfig(env: Env = process.env): CollectorConfig {
  return {
    host: envStr(env, "COLLECTOR_HOST", "127.0.0.1"),
    port: port(envNum(env, "COLLECTOR_PORT", DEFAULT_COLLECTOR_PORT), DEFAULT_COLLECTOR_PORT),
    namePath: envStr(env, "EVENT_NAME_PATH", "name"),
    nameFallbackPath: envOptStr(env, "EVENT_NAME_FALLBACK_PATH"),
    // Unlike the other strings an empty value is meaningful here: it turns envelope unwrapping off.
    batchField: env.EVENT_BATCH_FIELD ?? "events",
    maxBodyBytes: Math.max(1, Math.floor(envNum(env, "COLLECTOR_MAX_BODY_BYTES", 10 * 1024 * 1024))),
  };
}

export function loadMirrorConfig(env: Env = process.env): MirrorConfig {
  const targetPort = envOptNum(env, "MIRROR_TARGET_PORT");
  return {
    enabled: envBool(env, "MIRROR_ENABLED", true),
    target: {
      host: envStr(env, "MIRROR_TARGET_HOST", "*"),
      port: targetPort != null ? port(targetPort, 0) || undefined : undefined,
      path: envStr(env, "MIRROR_TARGET_PATH", "/batch"),
    },
    collectorUrl: envStr(env, "MIRROR_COLLECTOR_URL", DEFAULT_COLLECTOR_URL),
    timeoutMs: Math.max(1, Math.floor(envNum(env, "MIRROR_TIMEOUT_MS", 2000))),
    maxBodyBytes: Math.max(0, Math.floor(envNum(env, "MIRROR_MAX_BODY_BYTES", 1024 * 1024))),
  };
}

export function loadProxyConfig(env: Env = process.env): ProxyConfig {
  return {
    host: envStr(env, "PROXY_HOST", "127.0.0.1"),
    port: port(envNum(env, "PROXY_PORT", DEFAULT_PROXY_PORT), DEFAULT_PROXY_PORT),
    healthPort: port(envNum(env, "PROXY_HEALTH_PORT", DEFAULT_HEALTH_PORT), DEFAULT_HEALTH_PORT),
    tlsCertFile: envOptStr(env, "PROXY_TLS_CERT_FILE"),
    tlsKeyFile: envOptStr(env, "PROXY_TLS_KEY_FILE"),
    upstreamCaFile: envOptStr(env, "PROXY_UPSTREAM_CA_FILE"),
    mirror: loadMirrorConfig(env),
  };
}

// Environment understood by loadProxyConfig, for handing a target to a child proxy process.
export function proxyEnv(
  cfg: Pick<ProxyConfig, "host" | "port" | "healthPort" | "tlsCertFile" | "tlsKeyFile" | "upstreamCaFile">,
  target: TargetSpec,
  collectorUrl: string
): Record<string, string> {
  const env: Record<string, string> = {
    PROXY_HOST: cfg.host,
    PROXY_PORT: String(cfg.port),
    PROXY_HEALTH_PORT: String(cfg.healthPort),
    MIRROR_ENABLED: "true",
    MIRROR_TARGET_HOST: target.host,
    MIRROR_TARGET_PATH: target.path,
    MIRROR_COLLECTOR_URL: collectorUrl,
  };
  if (target.port != null) env.MIRROR_TARGET_PORT = String(target.port);
  if (cfg.tlsCertFile) env.PROXY_TLS_CERT_FILE = cfg.tlsCertFile;
  if (cfg.tlsKeyFile) env.PROXY_TLS_KEY_FILE = cfg.tlsKeyFile;
  if (cfg.upstreamCaFile) env.PROXY_UPSTREAM_CA_FILE = cfg.upstreamCaFile;
  return env;
}
