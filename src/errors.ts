import type { EventFilter } from "./filter.ts";
import { describeFilter } from "./filter.ts";

// Fatal setup failure: a port could not be bound or the proxy did not come up.
export class SetupError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SetupError";
  }
}

export class EventTimeoutError extends Error {
  readonly filter: EventFilter;
  readonly timeoutMs: number;
  // Message of the last failed poll, when the source was failing at the deadline.
  readonly lastError?: string;

  constructor(filter: EventFilter, timeoutMs: number, lastError?: string) {
    super(`no event matching ${describeFilter(filter)} within ${timeoutMs}ms${lastError ? ` (last query error: ${lastError})` : ""}`);
    this.name = "EventTimeoutError";
    this.filter = filter;
    this.timeoutMs = timeoutMs;
    this.lastError = lastError;
  }
}

export class EventAssertionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "EventAssertionError";
  }
}

export class WaitCancelledError extends Error {
  constructor(message = "wait cancelled") {
    super(message);
    this.name = "WaitCancelledError";
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
