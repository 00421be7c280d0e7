import type { MirrorConfig } from "../config.ts";
import type { ProxyAddon, RequestFlow, RequestHead } from "./addon.ts";
import { describeTarget, matchesTarget } from "./target.ts";
import type { ProxyMetrics } from "../metrics/metrics.ts";
import type { Logger } from "../logger.ts";
import { createLogger } from "../logger.ts";
import { errorMessage } from "../errors.ts";

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export type MirrorAddonOptions = MirrorConfig & {
  logger?: Logger;
  metrics?: Pick<ProxyMetrics, "mirrorForwardsTotal">;
  fetchImpl?: FetchLike;
};

export const SOURCE_HEADER = "x-eventtap-source";

/**
 * Copies the body of every request matching the target to the collector.
 *
 * Forwards are detached from the proxied request: `onRequest` only queues
 * the POST, which runs on its own timeout. A failed forward is logged and
 * counted; the app's own request never sees it.
 */
export class MirrorAddon implements ProxyAddon {
  readonly name = "mirror";
  private readonly cfg: MirrorConfig;
  private readonly logger: Logger;
  private readonly metrics?: Pick<ProxyMetrics, "mirrorForwardsTotal">;
  private readonly fetchImpl: FetchLike;
  private readonly inflight = new Set<Promise<void>>();
  private readonly controllers = new Set<AbortController>();
  private closed = false;

  constructor(opts: MirrorAddonOptions) {
    const { logger, metrics, fetchImpl, ...cfg } = opts;
    this.cfg = cfg;
    this.logger = logger ?? createLogger({ service: "mirror" });
    this.metrics = metrics;
    this.fetchImpl = fetchImpl ?? ((url, init) => fetch(url, init));
  }

  get pending(): number {
    return this.inflight.size;
  }

  interceptsHost(host: string, port: number): boolean {
    if (!this.cfg.enabled || this.closed) return false;
    const want = this.cfg.target.host.trim().toLowerCase();
    if (want !== "*" && want !== host.toLowerCase()) return false;
    return this.cfg.target.port == null || this.cfg.target.port === port;
  }

  matches(head: RequestHead): boolean {
    if (!this.cfg.enabled || this.closed) return false;
    return matchesTarget(this.cfg.target, head);
  }

  onRequest(flow: RequestFlow): void {
    if (this.closed) return;
    if (!flow.complete) {
      this.metrics?.mirrorForwardsTotal.inc({ result: "skipped" });
      this.logger.warn(
        { host: flow.host, path: flow.path, bytes: flow.bodyBytes, limit: this.cfg.maxBodyBytes },
        "mirror_skipped_body_too_large"
      );
      return;
    }
    const task: Promise<void> = this.forward(flow).finally(() => {
      this.inflight.delete(task);
    });
    this.inflight.add(task);
  }

  // Resolves once every forward started so far has finished.
  async drain(): Promise<void> {
    while (this.inflight.size) {
      await Promise.all([...this.inflight]);
    }
  }

  // Aborts in-flight forwards and ignores any further requests.
  async close(): Promise<void> {
    this.closed = true;
    for (const c of this.controllers) c.abort();
    await this.drain();
  }

  private async forward(flow: RequestFlow): Promise<void> {
    const ctrl = new AbortController();
    this.controllers.add(ctrl);
    const timer = setTimeout(() => ctrl.abort(), this.cfg.timeoutMs);
    const source = `${flow.scheme}://${flow.host}:${flow.port}${flow.path}`;
    const contentType = flow.headers["content-type"];
    try {
      const res = await this.fetchImpl(this.cfg.collectorUrl, {
        method: "POST",
        headers: {
          "content-type": typeof contentType === "string" && contentType ? contentType : "application/json",
          [SOURCE_HEADER]: source,
        },
        body: flow.body,
        signal: ctrl.signal,
      });
      await res.arrayBuffer();
      if (!res.ok) {
        this.metrics?.mirrorForwardsTotal.inc({ result: "http_error" });
        this.logger.warn({ source, collector: this.cfg.collectorUrl, status: res.status }, "mirror_failed");
        return;
      }
      this.metrics?.mirrorForwardsTotal.inc({ result: "ok" });
      this.logger.debug({ source, bytes: flow.body.length, status: res.status }, "mirror_forwarded");
    } catch (e) {
      this.metrics?.mirrorForwardsTotal.inc({ result: "error" });
      const reason = ctrl.signal.aborted ? (this.closed ? "closed" : `timeout after ${this.cfg.timeoutMs}ms`) : errorMessage(e);
      this.logger.warn({ source, collector: this.cfg.collectorUrl, err: reason }, "mirror_failed");
    } finally {
      clearTimeout(timer);
      this.controllers.delete(ctrl);
    }
  }

  describe(): string {
    return `${this.cfg.enabled ? "enabled" : "disabled"} ${describeTarget(this.cfg.target)} -> ${this.cfg.collectorUrl}`;
  }
}
