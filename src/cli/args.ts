import type { EventRecord, JsonValue } from "../events/types.ts";
import type { EventFilter } from "../filter.ts";
import { isNameMatchMode } from "../filter.ts";
import { parseDurationMs } from "../util/time.ts";

export type Args = Record<string, string | boolean | undefined>;

export function parseArgs(argv: string[]): { cmd: string; args: Args; rest: string[] } {
  const cmd = argv[0] ?? "help";
  const args: Args = {};
  const rest: string[] = [];
  for (let i = 1; i < argv.length; i++) {
    const a = argv[i];
    if (!a.startsWith("--")) {
      rest.push(a);
      continue;
    }
    const key = a.slice(2);
    const next = argv[i + 1];
    if (!next || next.startsWith("--")) {
      args[key] = true;
      continue;
    }
    args[key] = next;
    i++;
  }
  return { cmd, args, rest };
}

export function strArg(args: Args, key: string): string | undefined {
  const v = args[key];
  return typeof v === "string" ? v : undefined;
}

// Builds a filter from --name, --name-mode, --since (duration) and --contains (JSON subset).
export function filterFromArgs(args: Args, now = Date.now()): EventFilter {
  const f: EventFilter = {};
  const name = strArg(args, "name");
  if (name) f.name = name;
  const mode = strArg(args, "name-mode");
  if (mode) {
    if (!isNameMatchMode(mode)) throw new Error(`invalid --name-mode: ${mode}`);
    f.nameMode = mode;
  }
  const since = strArg(args, "since");
  if (since) {
    const ms = parseDurationMs(since);
    if (ms == null) throw new Error(`invalid --since (expected e.g. 30s, 5m): ${since}`);
    f.fromMs = now - ms;
  }
  const contains = strArg(args, "contains");
  if (contains) {
    let parsed: JsonValue;
    try {
      parsed = JSON.parse(contains);
    } catch {
      throw new Error(`--contains is not valid JSON: ${contains}`);
    }
    f.payloadContains = parsed;
  }
  return f;
}

export function durationArg(args: Args, key: string, def: number): number {
  const v = strArg(args, key);
  if (!v) return def;
  const ms = parseDurationMs(v);
  if (ms == null) throw new Error(`invalid --${key} (expected e.g. 500ms, 10s): ${v}`);
  return ms;
}

export function pretty(ev: EventRecord): string {
  const payload = JSON.stringify(ev.payload);
  const body = payload.length > 120 ? `${payload.slice(0, 120)}...` : payload;
  return `${new Date(ev.receivedAt).toISOString()} #${ev.cursor} batch=${ev.sourceBatchId} ${ev.name} ${body}`;
}
