import { z } from "zod";
import type { EventRecord, JsonValue } from "../events/types.ts";
import type { EventFilter } from "../filter.ts";
import { compileFilter } from "../filter.ts";
import type { CollectorServer } from "../collector/server.ts";
import type { FetchLike } from "../proxy/mirror.ts";

/**
 * Read access to a collector's events. Verifiers go through this and never
 * touch the store directly, so a collector in another process works the
 * same as one in the test process.
 */
export interface EventSource {
  query(filter: EventFilter, signal?: AbortSignal): Promise<EventRecord[]>;
}

export class CollectorEventSource implements EventSource {
  constructor(private readonly collector: Pick<CollectorServer, "query">) {}

  async query(filter: EventFilter): Promise<EventRecord[]> {
    return this.collector.query(filter);
  }
}

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValueSchema), z.record(jsonValueSchema)])
);

const eventRecordSchema = z.object({
  cursor: z.number().int(),
  name: z.string(),
  payload: jsonValueSchema,
  receivedAt: z.number(),
  sourceBatchId: z.number().int(),
  remoteAddress: z.string(),
});

const eventsResponseSchema = z.object({
  events: z.array(eventRecordSchema),
  next_cursor: z.number().int(),
  total: z.number().int(),
});

export type HttpEventSourceOptions = {
  fetchImpl?: FetchLike;
  timeoutMs?: number;
  pageSize?: number;
};

/**
 * Reads a collector over `GET /events`. Name and window criteria go to the
 * server; the full filter, predicates included, is applied again locally.
 */
export class HttpEventSource implements EventSource {
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchLike;
  private readonly timeoutMs: number;
  private readonly pageSize: number;

  constructor(baseUrl: string, opts: HttpEventSourceOptions = {}) {
    this.baseUrl = baseUrl.replace(/\/+$/, "");
    this.fetchImpl = opts.fetchImpl ?? ((url, init) => fetch(url, init));
    this.timeoutMs = opts.timeoutMs ?? 5000;
    this.pageSize = Math.floor(opts.pageSize ?? 1000);
    if (!(this.pageSize >= 1)) throw new RangeError(`pageSize must be at least 1, got ${opts.pageSize}`);
  }

  async query(filter: EventFilter, signal?: AbortSignal): Promise<EventRecord[]> {
    const matches = compileFilter(filter);
    const out: EventRecord[] = [];
    let since = 1;
    for (;;) {
      const params = new URLSearchParams({ since: String(since), limit: String(this.pageSize) });
      if (filter.name != null) params.set("name", filter.name);
      if (filter.nameMode) params.set("name_mode", filter.nameMode);
      if (filter.fromMs != null) params.set("from", String(filter.fromMs));
      if (filter.toMs != null) params.set("to", String(filter.toMs));
      const page = eventsResponseSchema.parse(await this.getJson(`/events?${params.toString()}`, signal));
      out.push(...page.events.filter(matches));
      if (page.events.length < this.pageSize) return out;
      since = page.next_cursor;
    }
  }

  // Readiness check: true once the collector answers GET /health.
  async health(signal?: AbortSignal): Promise<boolean> {
    try {
      return await this.request("/health", "GET", signal, async (res) => {
        await res.arrayBuffer();
        return res.ok;
      });
    } catch {
      return false;
    }
  }

  reset(signal?: AbortSignal): Promise<number> {
    return this.request("/reset", "DELETE", signal, async (res) => {
      if (!res.ok) throw new Error(`reset failed: http ${res.status}`);
      return z.object({ cleared: z.number().int() }).parse(await res.json()).cleared;
    });
  }

  private getJson(path: string, signal?: AbortSignal): Promise<unknown> {
    return this.request(path, "GET", signal, async (res) => {
      if (!res.ok) throw new Error(`GET ${path} failed: http ${res.status}`);
      return res.json();
    });
  }

  // Runs fetch and body handling under one timeout; listeners on the caller's signal are removed afterwards.
  private async request<T>(path: string, method: string, signal: AbortSignal | undefined, read: (res: Response) => Promise<T>): Promise<T> {
    const linked = linkSignals(signal ? [signal, AbortSignal.timeout(this.timeoutMs)] : [AbortSignal.timeout(this.timeoutMs)]);
    try {
      const res = await this.fetchImpl(`${this.baseUrl}${path}`, { method, signal: linked.signal });
      return await read(res);
    } finally {
      linked.release();
    }
  }
}

function linkSignals(signals: AbortSignal[]): { signal: AbortSignal; release: () => void } {
  const ctrl = new AbortController();
  const detach: Array<() => void> = [];
  for (const s of signals) {
    if (s.aborted) {
      ctrl.abort(s.reason);
      break;
    }
    const onAbort = () => ctrl.abort(s.reason);
    s.addEventListener("abort", onAbort, { once: true });
    detach.push(() => s.removeEventListener("abort", onAbort));
  }
  return { signal: ctrl.signal, release: () => detach.forEach((d) => d()) };
}
