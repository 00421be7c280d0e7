import type http from "node:http";
import type { AddressInfo } from "node:net";
import type { CollectorConfig } from "../config.ts";
import { loadCollectorConfig } from "../config.ts";
import { EventStore } from "../events/store.ts";
import type { EventRecord } from "../events/types.ts";
import { createCollectorServer } from "../api/collector.ts";
import { compileFilter } from "../filter.ts";
import type { EventFilter } from "../filter.ts";
import { createCollectorMetrics } from "../metrics/metrics.ts";
import type { CollectorMetrics } from "../metrics/metrics.ts";
import { createLogger } from "../logger.ts";
import type { Logger } from "../logger.ts";
import { SetupError } from "../errors.ts";

export type CollectorOptions = Partial<CollectorConfig> & {
  store?: EventStore;
  metrics?: CollectorMetrics;
  logger?: Logger;
};

/**
 * The batch ingestion server: owns one {@link EventStore}, accepts mirrored
 * batches on `POST /event` and exposes the store only through
 * {@link CollectorServer.query} and the HTTP query routes.
 */
export class CollectorServer {
  readonly cfg: CollectorConfig;
  private readonly store: EventStore;
  private readonly logger: Logger;
  private readonly server: http.Server;
  private address?: AddressInfo;

  constructor(opts: CollectorOptions = {}) {
    const { store, metrics, logger, ...overrides } = opts;
    this.cfg = { ...loadCollectorConfig(), ...overrides };
    this.store = store ?? new EventStore();
    this.logger = logger ?? createLogger({ service: "collector" });
    this.server = createCollectorServer({
      cfg: this.cfg,
      store: this.store,
      metrics: metrics ?? createCollectorMetrics(),
      logger: this.logger,
    });
  }

  get listening(): boolean {
    return this.address != null;
  }

  get port(): number {
    if (!this.address) throw new Error("collector is not listening");
    return this.address.port;
  }

  get baseUrl(): string {
    return `http://${this.cfg.host}:${this.port}`;
  }

  // Endpoint the mirror addon should post to.
  get eventUrl(): string {
    return `${this.baseUrl}/event`;
  }

  async start(): Promise<string> {
    if (this.address) return this.baseUrl;
    await new Promise<void>((resolve, reject) => {
      const onError = (e: NodeJS.ErrnoException) => {
        reject(new SetupError(`collector could not listen on ${this.cfg.host}:${this.cfg.port}: ${e.code ?? e.message}`, { cause: e }));
      };
      this.server.once("error", onError);
      this.server.listen(this.cfg.port, this.cfg.host, () => {
        this.server.off("error", onError);
        resolve();
      });
    });
    const addr = this.server.address();
    if (!addr || typeof addr === "string") throw new SetupError("collector bound to an unexpected address");
    this.address = addr;
    this.logger.info({ host: this.cfg.host, port: addr.port }, "collector_started");
    return this.baseUrl;
  }

  async stop(): Promise<void> {
    if (!this.address) return;
    await new Promise<void>((resolve) => {
      this.server.close(() => resolve());
      this.server.closeAllConnections();
    });
    this.address = undefined;
    this.logger.info("collector_stopped");
  }

  query(filter: EventFilter = {}): EventRecord[] {
    return this.store.query({ matches: compileFilter(filter) }).events;
  }

  reset(): number {
    const cleared = this.store.clear();
    this.logger.info({ cleared }, "store_reset");
    return cleared;
  }
}
