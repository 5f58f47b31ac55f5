import test from "node:test";
import assert from "node:assert/strict";
import { stableStringify } from "../../src/session/stable_stringify";

test("keys are sorted at every depth", () => {
  assert.equal(
    stableStringify({ b: 1, a: { d: [{ z: 1, y: 2 }], c: 2 } }),
    '{"a":{"c":2,"d":[{"y":2,"z":1}]},"b":1}'
  );
});

test("indentation is applied after sorting", () => {
  assert.equal(stableStringify({ b: null, a: "x" }, { indent: 2 }), '{\n  "a": "x",\n  "b": null\n}');
});

test("key order ignores insertion order", () => {
  assert.equal(stableStringify({ x: 1, y: 2 }), stableStringify({ y: 2, x: 1 }));
});

test("unsupported values are rejected", () => {
  assert.throws(
    () => stableStringify({ a: undefined }),
    /VALIDATION_ERROR stableStringify does not support type=undefined/
  );
  assert.throws(
    () => stableStringify([Number.NaN]),
    /VALIDATION_ERROR stableStringify does not support type=non-finite number/
  );
  assert.throws(
    () => stableStringify({ at: new Date(0) }),
    /VALIDATION_ERROR stableStringify only supports plain objects/
  );
});

test("a __proto__ key is kept as an ordinary key", () => {
  const value: unknown = JSON.parse('{"b":1,"__proto__":{"x":2}}');
  assert.equal(stableStringify(value), '{"__proto__":{"x":2},"b":1}');
});
