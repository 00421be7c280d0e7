import { describe, it, expect } from "vitest";
import { containsData, findKeyValue, hasKeyPath, jsonEquals, matchJson } from "../src/json/match.ts";

describe("matchJson", () => {
  it("handles string wildcards", () => {
    expect(matchJson({ id: 3 }, "*")).toBe(true);
    expect(matchJson("", "")).toBe(true);
    expect(matchJson("x", "")).toBe(false);
    expect(matchJson("product_detail", "~detail")).toBe(true);
    expect(matchJson(12, "~1")).toBe(false);
    expect(matchJson(42, "42")).toBe(true);
    expect(matchJson({ a: 1 }, "[object Object]")).toBe(false);
  });

  it("matches objects as subsets", () => {
    const actual = { name: "add_to_cart", item: { id: 9, price: 1.5 }, extra: true };
    expect(matchJson(actual, { item: { id: 9 } })).toBe(true);
    expect(matchJson(actual, { item: { id: 10 } })).toBe(false);
    expect(matchJson(actual, { missing: "*" })).toBe(false);
  });

  it("matches arrays regardless of order", () => {
    expect(matchJson([{ id: 1 }, { id: 2 }], [{ id: 2 }])).toBe(true);
    expect(matchJson([1, 2, 3], [3, 1])).toBe(true);
    expect(matchJson([1, 2], [4])).toBe(false);
    expect(matchJson({ 0: 1 }, [1])).toBe(false);
  });

  it("decodes serialized JSON inside strings", () => {
    expect(matchJson({ params: '{"screen":"home","n":2}' }, { params: { screen: "home" } })).toBe(true);
    expect(matchJson({ params: "plain" }, { params: { screen: "home" } })).toBe(false);
  });

  it("compares primitives strictly", () => {
    expect(matchJson(true, true)).toBe(true);
    expect(matchJson(1, true)).toBe(false);
    expect(matchJson(null, null)).toBe(true);
  });

  it("never matches inherited keys", () => {
    expect(matchJson({}, { constructor: "*" })).toBe(false);
    expect(matchJson({ a: 1 }, { toString: "*", a: 1 })).toBe(false);
    expect(containsData({ name: "a" }, { hasOwnProperty: "*" })).toBe(false);
  });
});

describe("findKeyValue / containsData", () => {
  const payload = {
    name: "purchase",
    event: { data: { order: { id: "o-1" }, items: [{ sku: "s-1" }, { sku: "s-2" }] } },
    meta: { sku: "top" },
  };

  it("finds a key at any depth", () => {
    expect(findKeyValue(payload, "sku", "s-2")).toBe(true);
    expect(findKeyValue(payload, "sku", "s-3")).toBe(false);
  });

  it("requires every pair", () => {
    expect(containsData(payload, { id: "o-1", sku: "s-1" })).toBe(true);
    expect(containsData(payload, { id: "o-1", sku: "nope" })).toBe(false);
  });

  it("falls back to the whole payload", () => {
    expect(containsData(payload, { sku: "top" })).toBe(true);
    expect(containsData({ data: { a: 1 } }, { a: 1 })).toBe(true);
  });
});

describe("hasKeyPath / jsonEquals", () => {
  it("follows dotted paths", () => {
    const tree = { a: { b: { c: null } } };
    expect(hasKeyPath(tree, "a.b.c")).toBe(true);
    expect(hasKeyPath(tree, "a/b", "/")).toBe(true);
    expect(hasKeyPath(tree, "a.x")).toBe(false);
    expect(hasKeyPath(tree, "")).toBe(true);
  });

  it("compares deeply", () => {
    expect(jsonEquals({ a: [1, { b: 2 }] }, { a: [1, { b: 2 }] })).toBe(true);
    expect(jsonEquals({ a: 1 }, { a: "1" })).toBe(false);
  });

  it("does not follow prototype properties", () => {
    expect(hasKeyPath({}, "toString")).toBe(false);
    expect(hasKeyPath({ a: {} }, "a.constructor.name")).toBe(false);
  });
});
