import type { EventRecord, IncomingBatch, JsonValue } from "./types.ts";

export type Query = {
  sinceCursor?: number;
  fromMs?: number;
  toMs?: number;
  limit?: number;
  matches?: (ev: EventRecord) => boolean;
};

export type QueryResult = {
  events: EventRecord[];
  nextCursor: number;
};

function deepFreeze(v: JsonValue): JsonValue {
  if (v !== null && typeof v === "object") {
    const children: JsonValue[] = Array.isArray(v) ? v : Object.values(v);
    for (const child of children) deepFreeze(child);
    Object.freeze(v);
  }
  return v;
}

/**
 * Append-only, insertion-ordered event store. Nothing is evicted; the store
 * lives for one test run and is emptied only through {@link EventStore.clear}.
 *
 * Appends happen inside a single synchronous call, so a reader on the same
 * event loop never observes a half-written batch.
 */
export class EventStore {
  private events: EventRecord[] = [];
  private nextCursor = 1;
  private nextBatchId = 1;
  private lastReceivedAt = 0;

  size(): number {
    return this.events.length;
  }

  append(batch: IncomingBatch): EventRecord[] {
    const sourceBatchId = this.nextBatchId++;
    // Wall clocks can step backwards; keep receivedAt ordered with cursors.
    const receivedAt = Math.max(Date.now(), this.lastReceivedAt);
    this.lastReceivedAt = receivedAt;

    const stored: EventRecord[] = [];
    for (const el of batch.elements) {
      const rec: EventRecord = Object.freeze({
        cursor: this.nextCursor++,
        name: el.name,
        payload: deepFreeze(el.payload),
        receivedAt,
        sourceBatchId,
        remoteAddress: batch.remoteAddress,
      });
      this.events.push(rec);
      stored.push(rec);
    }
    return stored;
  }

  query(q: Query = {}): QueryResult {
    const limit = Math.max(0, Math.min(50_000, q.limit ?? 50_000));
    const out: EventRecord[] = [];
    for (const ev of this.events) {
      if (out.length >= limit) break;
      if (q.sinceCursor != null && ev.cursor < q.sinceCursor) continue;
      if (q.fromMs != null && ev.receivedAt < q.fromMs) continue;
      if (q.toMs != null && ev.receivedAt >= q.toMs) continue;
      if (q.matches && !q.matches(ev)) continue;
      out.push(ev);
    }
    const nextCursor = out.length ? out[out.length - 1].cursor + 1 : q.sinceCursor ?? this.nextCursor;
    return { events: out, nextCursor };
  }

  // Snapshot of every stored event (oldest -> newest).
  all(): EventRecord[] {
    return this.events.slice();
  }

  clear(): number {
    const n = this.events.length;
    this.events = [];
    return n;
  }
}
