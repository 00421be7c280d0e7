import type { EventRecord, JsonValue } from "./events/types.ts";
import { containsData, jsonEquals, matchJson } from "./json/match.ts";

export type NameMatchMode = "exact" | "contains" | "starts_with" | "regex";

export const NAME_MATCH_MODES: readonly NameMatchMode[] = ["exact", "contains", "starts_with", "regex"];

/**
 * Criteria for selecting stored events. Every criterion that is set must
 * hold; an empty filter selects everything.
 */
export type EventFilter = {
  name?: string;
  nameMode?: NameMatchMode;
  nameMatches?: RegExp;
  /** Inclusive lower bound on `receivedAt` (ms epoch). */
  fromMs?: number;
  /** Exclusive upper bound on `receivedAt` (ms epoch). */
  toMs?: number;
  payload?: (payload: JsonValue) => boolean;
  payloadContains?: JsonValue;
  payloadEquals?: JsonValue;
  dataContains?: Record<string, JsonValue>;
  where?: (ev: EventRecord) => boolean;
};

export function isNameMatchMode(v: string): v is NameMatchMode {
  return NAME_MATCH_MODES.some((m) => m === v);
}

export function nameMatches(actual: string, expected: string, mode: NameMatchMode): boolean {
  switch (mode) {
    case "exact":
      return actual === expected;
    case "contains":
      return actual.includes(expected);
    case "starts_with":
      return actual.startsWith(expected);
    case "regex":
      try {
        return new RegExp(expected).test(actual);
      } catch {
        return false;
      }
  }
}

export function inWindow(ev: EventRecord, f: Pick<EventFilter, "fromMs" | "toMs">): boolean {
  if (f.fromMs != null && ev.receivedAt < f.fromMs) return false;
  if (f.toMs != null && ev.receivedAt >= f.toMs) return false;
  return true;
}

export function compileFilter(f: EventFilter): (ev: EventRecord) => boolean {
  const mode = f.nameMode ?? "exact";
  // Stateful flags would make repeated test() calls alternate.
  const re = f.nameMatches ? new RegExp(f.nameMatches.source, f.nameMatches.flags.replace(/[gy]/g, "")) : undefined;
  return (ev) => {
    if (f.name != null && !nameMatches(ev.name, f.name, mode)) return false;
    if (re && !re.test(ev.name)) return false;
    if (!inWindow(ev, f)) return false;
    if (f.payloadContains !== undefined && !matchJson(ev.payload, f.payloadContains)) return false;
    if (f.payloadEquals !== undefined && !jsonEquals(ev.payload, f.payloadEquals)) return false;
    if (f.dataContains && !containsData(ev.payload, f.dataContains)) return false;
    if (f.payload && !f.payload(ev.payload)) return false;
    if (f.where && !f.where(ev)) return false;
    return true;
  };
}

function fmtTs(ms: number): string {
  return new Date(ms).toISOString();
}

export function describeWindow(f: Pick<EventFilter, "fromMs" | "toMs">): string {
  const from = f.fromMs != null ? fmtTs(f.fromMs) : "-inf";
  const to = f.toMs != null ? fmtTs(f.toMs) : "+inf";
  return `[${from}, ${to})`;
}

export function describeFilter(f: EventFilter): string {
  const parts: string[] = [];
  if (f.name != null) parts.push(`name ${f.nameMode ?? "exact"} ${JSON.stringify(f.name)}`);
  if (f.nameMatches) parts.push(`name =~ ${String(f.nameMatches)}`);
  if (f.fromMs != null || f.toMs != null) parts.push(`window ${describeWindow(f)}`);
  if (f.payloadContains !== undefined) parts.push(`payload contains ${JSON.stringify(f.payloadContains)}`);
  if (f.payloadEquals !== undefined) parts.push(`payload equals ${JSON.stringify(f.payloadEquals)}`);
  if (f.dataContains) parts.push(`data contains ${JSON.stringify(f.dataContains)}`);
  if (f.payload) parts.push("payload predicate");
  if (f.where) parts.push("custom predicate");
  return parts.length ? parts.join(" and ") : "any event";
}
