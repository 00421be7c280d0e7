import { isDeepStrictEqual } from "node:util";
import type { JsonValue } from "../events/types.ts";
import { isJsonObject } from "../events/types.ts";

function parseEmbedded(s: string): JsonValue | undefined {
  const t = s.trim();
  if (!t.startsWith("{") && !t.startsWith("[")) return undefined;
  try {
    const v: JsonValue = JSON.parse(t);
    return v;
  } catch {
    return undefined;
  }
}

function matchString(actual: JsonValue, expected: string): boolean {
  if (expected === "*") return true;
  if (expected === "") return actual === "";
  if (expected.startsWith("~")) return typeof actual === "string" && actual.includes(expected.slice(1));
  if (actual === null || typeof actual === "object") return false;
  return String(actual) === expected;
}

/**
 * Matches an actual JSON value against an expected pattern.
 *
 * - `"*"` matches anything, `""` only the empty string, `"~abc"` any string
 *   containing `abc`; other strings compare against the actual value's
 *   string form (so `"42"` matches `42`).
 * - Objects match as subsets, arrays match when every expected element is
 *   found somewhere in the actual array.
 * - An actual string holding serialized JSON is decoded before matching an
 *   expected object or array.
 */
export function matchJson(actual: JsonValue, expected: JsonValue): boolean {
  if (typeof expected === "string") return matchString(actual, expected);
  if (expected === null || typeof expected !== "object") return actual === expected;

  if (typeof actual === "string") {
    const decoded = parseEmbedded(actual);
    return decoded !== undefined && matchJson(decoded, expected);
  }

  if (Array.isArray(expected)) {
    if (!Array.isArray(actual)) return false;
    const items = actual;
    return expected.every((want) => items.some((got) => matchJson(got, want)));
  }

  if (!isJsonObject(actual)) return false;
  for (const [k, want] of Object.entries(expected)) {
    if (!Object.hasOwn(actual, k)) return false;
    if (!matchJson(actual[k], want)) return false;
  }
  return true;
}

// Depth-first search for `key` anywhere in the tree with a value matching `expected`.
export function findKeyValue(tree: JsonValue, key: string, expected: JsonValue): boolean {
  if (Array.isArray(tree)) return tree.some((el) => findKeyValue(el, key, expected));
  if (!isJsonObject(tree)) return false;
  for (const [k, v] of Object.entries(tree)) {
    if (k === key && matchJson(v, expected)) return true;
    if (findKeyValue(v, key, expected)) return true;
  }
  return false;
}

function dataNode(payload: JsonValue): JsonValue | undefined {
  if (!isJsonObject(payload)) return undefined;
  const ev = payload.event;
  if (isJsonObject(ev) && Object.hasOwn(ev, "data")) return ev.data;
  return Object.hasOwn(payload, "data") ? payload.data : undefined;
}

/**
 * True when every key/value pair in `pairs` is present somewhere in the
 * payload, each pair possibly on a different branch. A `data` node
 * (`event.data` or `data`) is searched first.
 */
export function containsData(payload: JsonValue, pairs: Record<string, JsonValue>): boolean {
  const data = dataNode(payload);
  for (const [key, want] of Object.entries(pairs)) {
    const found = (data !== undefined && findKeyValue(data, key, want)) || findKeyValue(payload, key, want);
    if (!found) return false;
  }
  return true;
}

export function jsonEquals(a: JsonValue, b: JsonValue): boolean {
  return isDeepStrictEqual(a, b);
}

// Checks that a dotted key path exists in an object tree.
export function hasKeyPath(tree: JsonValue, keyPath: string, sep = "."): boolean {
  let cur: JsonValue = tree;
  for (const part of keyPath ? keyPath.split(sep) : []) {
    if (!isJsonObject(cur) || !Object.hasOwn(cur, part)) return false;
    cur = cur[part];
  }
  return true;
}
