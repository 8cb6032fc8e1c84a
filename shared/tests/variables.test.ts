import { describe, expect, it } from "vitest";
import { VariableResolutionError } from "../src/errors.js";
import { lookupVariable, resolveParams, resolveString, resolveVariables } from "../src/variables.js";

describe("resolveString", () => {
  it("renders placeholders inside text", () => {
    expect(resolveString("Hello ${user.name}!", { user: { name: "Ada" } })).toBe("Hello Ada!");
  });

  it("keeps the raw value when the string is a single placeholder", () => {
    expect(resolveString("${count}", { count: 3 })).toBe(3);
    expect(resolveString("${step1}", { step1: { status_code: 200 } })).toEqual({ status_code: 200 });
  });

  it("renders objects as JSON and null as text", () => {
    expect(resolveString("data=${obj} none=${empty}", { obj: { a: 1 }, empty: null })).toBe('data={"a":1} none=null');
  });

  it("fails on a missing path instead of substituting an empty string", () => {
    expect(() => resolveString("code ${step1.status_code}", { step1: {} })).toThrow(VariableResolutionError);
    expect(() => resolveString("code ${step1.status_code}", { step1: {} })).toThrow(
      "Unresolvable variable path 'step1.status_code'."
    );
  });
});

describe("lookupVariable", () => {
  it("indexes into arrays", () => {
    expect(lookupVariable("items.1.id", { items: [{ id: "a" }, { id: "b" }] })).toBe("b");
  });

  it("rejects out-of-range indexes", () => {
    expect(() => lookupVariable("items.2", { items: [1, 2] })).toThrow("Unresolvable variable path 'items.2'.");
  });
});

describe("resolveVariables", () => {
  it("keeps the structure of nested values", () => {
    const scope = { n: 3, items: ["a", "b"], name: "run" };
    expect(resolveVariables({ count: "${n}", list: ["${items.1}", "x-${name}"], flag: true }, scope)).toEqual({
      count: 3,
      list: ["b", "x-run"],
      flag: true
    });
  });

  it("is idempotent on values without placeholders", () => {
    const value = { url: "https://example.test/a", retries: 2, tags: ["x", null] };
    const once = resolveVariables(value, {});
    expect(resolveVariables(once, {})).toEqual(once);
    expect(once).toEqual(value);
  });
});

describe("resolveParams", () => {
  it("resolves every parameter against the scope", () => {
    expect(resolveParams({ x: "${in}", y: "static" }, { in: "hi" })).toEqual({ x: "hi", y: "static" });
  });
});
