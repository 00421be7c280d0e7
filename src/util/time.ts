import { setTimeout as sleepTimer } from "node:timers/promises";
import { WaitCancelledError } from "../errors.ts";

export function parseDurationMs(s: string): number | undefined {
  const m = /^(\d+)(ms|s|m|h|d)$/.exec(s.trim());
  if (!m) return undefined;
  const n = Number(m[1]);
  const unit = m[2];
  const mul =
    unit === "ms" ? 1 :
    unit === "s" ? 1000 :
    unit === "m" ? 60_000 :
    unit === "h" ? 3_600_000 :
    86_400_000;
  return n * mul;
}

// Accepts ms since epoch or an ISO-8601 timestamp.
export function parseTimestampMs(v: string | null | undefined): number | undefined {
  if (v == null || v.trim() === "") return undefined;
  const t = v.trim();
  if (/^\d+$/.test(t)) return Number(t);
  const ms = Date.parse(t);
  return Number.isFinite(ms) ? ms : undefined;
}

export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) throw new WaitCancelledError();
  try {
    await sleepTimer(Math.max(0, ms), undefined, { signal });
  } catch (e) {
    if (signal?.aborted) throw new WaitCancelledError();
    throw e;
  }
}
