import type { BatchElement, JsonObject, JsonValue } from "./types.ts";
import { isJsonObject } from "./types.ts";

export const UNKNOWN_EVENT_NAME = "unknown";

export type NameOptions = {
  namePath: string;
  nameFallbackPath?: string;
};

export type ParseOptions = NameOptions & {
  // Envelope field holding the batch array, e.g. {"meta": {...}, "events": [...]}. Empty disables.
  batchField: string;
};

export type SkippedElement = {
  index: number;
  reason: string;
};

export type ParsedBatch =
  | { ok: true; elements: BatchElement[]; skipped: SkippedElement[] }
  | { ok: false; error: string };

function readPath(v: JsonValue, path: string): JsonValue | undefined {
  if (!path) return undefined;
  let cur: JsonValue | undefined = v;
  for (const part of path.split(".")) {
    if (!isJsonObject(cur) || !Object.hasOwn(cur, part)) return undefined;
    cur = cur[part];
  }
  return cur;
}

function nameAt(payload: JsonValue, path: string | undefined): string | undefined {
  if (!path) return undefined;
  const v = readPath(payload, path);
  if (typeof v === "string" && v.trim() !== "") return v;
  if (typeof v === "number" && Number.isFinite(v)) return String(v);
  return undefined;
}

export function extractName(payload: JsonValue, opts: NameOptions): string {
  return nameAt(payload, opts.namePath) ?? nameAt(payload, opts.nameFallbackPath) ?? UNKNOWN_EVENT_NAME;
}

function tryParse(text: string): { ok: true; value: JsonValue } | { ok: false } {
  try {
    const value: JsonValue = JSON.parse(text);
    return { ok: true, value };
  } catch {
    return { ok: false };
  }
}

function toElementObject(raw: JsonValue): JsonObject | undefined {
  if (isJsonObject(raw)) return raw;
  // Some SDKs double-encode each event as a JSON string.
  if (typeof raw === "string") {
    const parsed = tryParse(raw);
    if (parsed.ok && isJsonObject(parsed.value)) return parsed.value;
  }
  return undefined;
}

function describeRaw(raw: JsonValue): string {
  if (raw === null) return "null";
  if (Array.isArray(raw)) return "array";
  if (typeof raw === "string") return "string that is not a JSON object";
  return typeof raw;
}

function fromValues(values: JsonValue[], opts: ParseOptions): ParsedBatch {
  const elements: BatchElement[] = [];
  const skipped: SkippedElement[] = [];
  values.forEach((raw, index) => {
    const obj = toElementObject(raw);
    if (!obj) {
      skipped.push({ index, reason: `element is a ${describeRaw(raw)}` });
      return;
    }
    elements.push({ name: extractName(obj, opts), payload: obj });
  });
  return { ok: true, elements, skipped };
}

function fromLines(lines: string[], opts: ParseOptions): ParsedBatch {
  const elements: BatchElement[] = [];
  const skipped: SkippedElement[] = [];
  lines.forEach((line, index) => {
    const parsed = tryParse(line);
    const obj = parsed.ok ? toElementObject(parsed.value) : undefined;
    if (!obj) {
      skipped.push({ index, reason: parsed.ok ? `line is a ${describeRaw(parsed.value)}` : "line is not valid JSON" });
      return;
    }
    elements.push({ name: extractName(obj, opts), payload: obj });
  });
  if (elements.length === 0) return { ok: false, error: "no line of the body is a JSON object" };
  return { ok: true, elements, skipped };
}

/**
 * Splits a mirrored request body into batch elements.
 *
 * Accepted shapes: a JSON object, a JSON array, an envelope object whose
 * `batchField` is an array, or newline-delimited JSON. A body that cannot be
 * read as any of these is rejected whole; individual bad elements are skipped.
 */
export function parseBatch(body: string, opts: ParseOptions): ParsedBatch {
  const text = body.trim();
  if (!text) return { ok: false, error: "empty body" };

  const whole = tryParse(text);
  if (whole.ok) {
    const v = whole.value;
    if (Array.isArray(v)) return fromValues(v, opts);
    if (isJsonObject(v)) {
      const inner = opts.batchField ? v[opts.batchField] : undefined;
      if (Array.isArray(inner)) return fromValues(inner, opts);
      return fromValues([v], opts);
    }
    return { ok: false, error: "body must be a JSON object or array" };
  }

  const lines = text.split(/\r?\n/).map((l) => l.trim()).filter((l) => l !== "");
  if (lines.length > 1) return fromLines(lines, opts);
  return { ok: false, error: "body is not valid JSON" };
}
