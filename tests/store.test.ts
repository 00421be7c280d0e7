import { describe, it, expect, vi, afterEach } from "vitest";
import { EventStore } from "../src/events/store.ts";
import { isJsonObject } from "../src/events/types.ts";

const batch = (...names: string[]) => ({
  remoteAddress: "127.0.0.1:1234",
  elements: names.map((name) => ({ name, payload: { name } })),
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("EventStore", () => {
  it("assigns increasing cursors and one batch id per append", () => {
    const store = new EventStore();
    const first = store.append(batch("a", "b"));
    const second = store.append(batch("c"));
    expect(first.map((e) => e.cursor)).toEqual([1, 2]);
    expect(second.map((e) => e.cursor)).toEqual([3]);
    expect(first.map((e) => e.sourceBatchId)).toEqual([1, 1]);
    expect(second[0].sourceBatchId).toBe(2);
    expect(first[0].receivedAt).toBe(first[1].receivedAt);
    expect(store.size()).toBe(3);
  });

  it("freezes stored records", () => {
    const [rec] = new EventStore().append(batch("a"));
    expect(Object.isFrozen(rec)).toBe(true);
  });

  it("freezes payloads all the way down", () => {
    const store = new EventStore();
    const [rec] = store.append({
      remoteAddress: "127.0.0.1:1234",
      elements: [{ name: "a", payload: { name: "a", n: 1, tags: ["x"], meta: { depth: 1 } } }],
    });
    const payload = rec.payload;
    if (!isJsonObject(payload)) throw new Error("payload is not an object");
    const tags = payload.tags;
    const meta = payload.meta;
    if (!Array.isArray(tags) || !isJsonObject(meta)) throw new Error("unexpected payload shape");

    expect(() => {
      payload.n = 999;
    }).toThrow(TypeError);
    expect(() => {
      meta.depth = 2;
    }).toThrow(TypeError);
    expect(() => tags.push("y")).toThrow(TypeError);
    expect(store.query({}).events[0].payload).toEqual({ name: "a", n: 1, tags: ["x"], meta: { depth: 1 } });
  });

  it("returns events in insertion order", () => {
    const store = new EventStore();
    store.append(batch("a", "b"));
    store.append(batch("c"));
    expect(store.all().map((e) => e.name)).toEqual(["a", "b", "c"]);
  });

  it("keeps receivedAt ordered when the clock steps back", () => {
    const now = vi.spyOn(Date, "now");
    now.mockReturnValueOnce(5_000).mockReturnValueOnce(4_000);
    const store = new EventStore();
    const [a] = store.append(batch("a"));
    const [b] = store.append(batch("b"));
    expect(a.receivedAt).toBe(5_000);
    expect(b.receivedAt).toBe(5_000);
  });

  it("queries by cursor, window, limit and predicate", () => {
    const now = vi.spyOn(Date, "now");
    now.mockReturnValueOnce(1_000).mockReturnValueOnce(2_000).mockReturnValueOnce(3_000);
    const store = new EventStore();
    store.append(batch("a"));
    store.append(batch("b", "c"));
    store.append(batch("d"));

    expect(store.query({ sinceCursor: 3 }).events.map((e) => e.name)).toEqual(["c", "d"]);
    expect(store.query({ fromMs: 2_000, toMs: 3_000 }).events.map((e) => e.name)).toEqual(["b", "c"]);
    expect(store.query({ matches: (e) => e.name !== "b" }).events.map((e) => e.name)).toEqual(["a", "c", "d"]);

    const page = store.query({ limit: 2 });
    expect(page.events.map((e) => e.name)).toEqual(["a", "b"]);
    expect(page.nextCursor).toBe(3);
  });

  it("reports the next cursor for an empty result", () => {
    const store = new EventStore();
    store.append(batch("a", "b"));
    expect(store.query({ matches: () => false }).nextCursor).toBe(3);
    expect(store.query({ sinceCursor: 10 }).nextCursor).toBe(10);
  });

  it("clears without reusing cursors", () => {
    const store = new EventStore();
    store.append(batch("a", "b"));
    expect(store.clear()).toBe(2);
    expect(store.clear()).toBe(0);
    expect(store.size()).toBe(0);
    const [c] = store.append(batch("c"));
    expect(c.cursor).toBe(3);
  });
});
