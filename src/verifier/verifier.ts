import type { EventRecord } from "../events/types.ts";
import type { EventFilter } from "../filter.ts";
import { describeFilter, describeWindow, inWindow } from "../filter.ts";
import { EventAssertionError, EventTimeoutError, WaitCancelledError, errorMessage } from "../errors.ts";
import type { Logger } from "../logger.ts";
import { createLogger } from "../logger.ts";
import { sleep } from "../util/time.ts";
import type { EventSource } from "./source.ts";

export type WaitOptions = {
  timeoutMs?: number;
  pollIntervalMs?: number;
  signal?: AbortSignal;
};

export type CorrelateOptions = WaitOptions & {
  // Settling time before the action's start is recorded.
  preDelayMs?: number;
};

export type RetryOptions = WaitOptions & {
  attempts?: number;
  // Runs between attempts, e.g. a scroll that brings more content on screen.
  onRetry?: (attempt: number) => unknown;
};

export type VerifierOptions = {
  timeoutMs?: number;
  pollIntervalMs?: number;
  summaryLimit?: number;
  logger?: Logger;
};

type Check = {
  label: string;
  result: Promise<{ ok: true } | { ok: false; error: string }>;
};

function payloadPreview(ev: EventRecord, max = 200): string {
  const s = JSON.stringify(ev.payload);
  return s.length > max ? `${s.slice(0, max)}...` : s;
}

/**
 * Polls an {@link EventSource} for events matching a filter.
 *
 * Mirrored events reach the collector some time after the UI action that
 * caused them, so every check here is a bounded poll rather than a single
 * lookup. The verifier keeps no event state of its own; it only tracks the
 * waits it has started so teardown can cancel them.
 */
export class EventVerifier {
  private readonly source: EventSource;
  private readonly timeoutMs: number;
  private readonly pollIntervalMs: number;
  private readonly summaryLimit: number;
  private readonly logger: Logger;
  private readonly running = new Set<AbortController>();
  private checks: Check[] = [];

  constructor(source: EventSource, opts: VerifierOptions = {}) {
    this.source = source;
    this.timeoutMs = opts.timeoutMs ?? 10_000;
    this.pollIntervalMs = opts.pollIntervalMs ?? 250;
    this.summaryLimit = opts.summaryLimit ?? 20;
    this.logger = opts.logger ?? createLogger({ service: "verifier" });
  }

  queryAll(filter: EventFilter = {}, signal?: AbortSignal): Promise<EventRecord[]> {
    return this.source.query(filter, signal);
  }

  async waitFor(filter: EventFilter, opts: WaitOptions = {}): Promise<EventRecord> {
    const timeoutMs = opts.timeoutMs ?? this.timeoutMs;
    const pollIntervalMs = Math.max(1, opts.pollIntervalMs ?? this.pollIntervalMs);
    const { ctrl, release } = this.track(opts.signal);
    const deadline = Date.now() + timeoutMs;
    let lastError: string | undefined;
    this.logger.debug({ filter: describeFilter(filter), timeoutMs }, "wait_start");
    try {
      for (;;) {
        if (ctrl.signal.aborted) throw new WaitCancelledError();
        let first: EventRecord | undefined;
        try {
          [first] = await this.source.query(filter, ctrl.signal);
          lastError = undefined;
        } catch (e) {
          if (ctrl.signal.aborted) throw e;
          // A failed poll is retried until the deadline.
          lastError = errorMessage(e);
          this.logger.warn({ filter: describeFilter(filter), err: lastError }, "wait_query_failed");
        }
        if (first) {
          this.logger.info({ filter: describeFilter(filter), cursor: first.cursor, name: first.name }, "wait_matched");
          return first;
        }
        const remaining = deadline - Date.now();
        if (remaining <= 0) {
          this.logger.warn({ filter: describeFilter(filter), timeoutMs }, "wait_timeout");
          throw new EventTimeoutError(filter, timeoutMs, lastError);
        }
        await sleep(Math.min(pollIntervalMs, remaining), ctrl.signal);
      }
    } catch (e) {
      if (ctrl.signal.aborted && !(e instanceof EventTimeoutError)) throw new WaitCancelledError();
      throw e;
    } finally {
      release();
      this.running.delete(ctrl);
    }
  }

  async assertContains(filter: EventFilter, opts: WaitOptions = {}): Promise<EventRecord> {
    try {
      return await this.waitFor(filter, opts);
    } catch (e) {
      if (!(e instanceof EventTimeoutError)) throw e;
      throw new EventAssertionError(await this.timeoutReport(e), { cause: e });
    }
  }

  /**
   * Runs a UI action and asserts that a matching event arrived after it
   * started. Events received before the action are never matched.
   */
  async correlateWithAction(action: () => unknown, filter: EventFilter, opts: CorrelateOptions = {}): Promise<EventRecord> {
    if (opts.preDelayMs) await sleep(opts.preDelayMs, opts.signal);
    const startedAt = Date.now();
    await action();
    const fromMs = filter.fromMs != null ? Math.max(filter.fromMs, startedAt) : startedAt;
    return this.assertContains({ ...filter, fromMs }, opts);
  }

  /**
   * Waits up to `attempts` times, calling `onRetry` after each miss. A failing
   * `onRetry` is logged and the next attempt still runs.
   */
  async waitForWithRetries(filter: EventFilter, opts: RetryOptions = {}): Promise<EventRecord> {
    const attempts = Math.max(1, Math.floor(opts.attempts ?? 3));
    for (let attempt = 1; ; attempt++) {
      try {
        return await this.waitFor(filter, opts);
      } catch (e) {
        if (!(e instanceof EventTimeoutError)) throw e;
        if (attempt >= attempts) {
          const report = await this.timeoutReport(e);
          throw new EventAssertionError(`${report}\nattempts: ${attempts}`, { cause: e });
        }
        this.logger.info({ filter: describeFilter(filter), attempt, attempts }, "wait_retry");
        if (opts.onRetry) {
          try {
            await opts.onRetry(attempt);
          } catch (retryErr) {
            this.logger.warn({ attempt, err: errorMessage(retryErr) }, "retry_action_failed");
          }
        }
      }
    }
  }

  // Starts a wait without blocking the caller; awaitChecks() collects the outcome.
  startCheck(filter: EventFilter, opts: WaitOptions = {}): void {
    const label = describeFilter(filter);
    const result = this.assertContains(filter, opts).then(
      () => ({ ok: true as const }),
      (e: unknown) => ({ ok: false as const, error: errorMessage(e) })
    );
    this.checks.push({ label, result });
  }

  async awaitChecks(): Promise<void> {
    const checks = this.checks;
    this.checks = [];
    const results = await Promise.all(checks.map((c) => c.result));
    const failed: string[] = [];
    results.forEach((r, i) => {
      if (!r.ok) failed.push(`#${i + 1} ${checks[i].label}: ${r.error.split("\n")[0]}`);
    });
    if (failed.length) {
      throw new EventAssertionError(`${failed.length} of ${checks.length} background event checks failed:\n${failed.join("\n")}`);
    }
  }

  // Aborts every wait this verifier is running; call from test teardown.
  cancelAll(): void {
    for (const c of this.running) c.abort();
  }

  // The caller's signal may outlive many waits; release() drops the listener added here.
  private track(external?: AbortSignal): { ctrl: AbortController; release: () => void } {
    const ctrl = new AbortController();
    const onAbort = () => ctrl.abort();
    if (external?.aborted) ctrl.abort();
    else external?.addEventListener("abort", onAbort, { once: true });
    this.running.add(ctrl);
    return { ctrl, release: () => external?.removeEventListener("abort", onAbort) };
  }

  private async timeoutReport(err: EventTimeoutError): Promise<string> {
    const { filter, timeoutMs } = err;
    const window = { fromMs: filter.fromMs, toMs: filter.toMs };
    const lines = [
      `expected event not received within ${timeoutMs}ms`,
      `filter: ${describeFilter(filter)}`,
      `window: ${describeWindow(window)}`,
    ];
    if (err.lastError) lines.push(`last query error: ${err.lastError}`);
    let seen: EventRecord[];
    try {
      seen = (await this.source.query({})).filter((ev) => inWindow(ev, window));
    } catch (e) {
      lines.push(`events seen: unavailable (${errorMessage(e)})`);
      return lines.join("\n");
    }
    lines.push(`events seen in window: ${seen.length}`);
    for (const ev of seen.slice(0, this.summaryLimit)) {
      lines.push(`  #${ev.cursor} ${ev.name} @ ${new Date(ev.receivedAt).toISOString()} ${payloadPreview(ev)}`);
    }
    if (seen.length > this.summaryLimit) lines.push(`  ... ${seen.length - this.summaryLimit} more`);
    return lines.join("\n");
  }
}
