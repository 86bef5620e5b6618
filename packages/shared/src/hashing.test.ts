import { test } from "node:test";
import assert from "node:assert/strict";
import { canonicalizeJson } from "./canonicalJson.js";
import { hashCanonicalJson, sha256Hex } from "./hashing.js";
import { createMetricsRegistry } from "./metrics.js";

test("canonical json sorts keys at every depth and drops undefined members", () => {
  const text = canonicalizeJson({ b: 1, a: { d: [{ z: 1, y: 2 }], c: undefined } });
  assert.equal(text, '{"a":{"d":[{"y":2,"z":1}]},"b":1}');
});

test("hashCanonicalJson is insensitive to key order", () => {
  assert.equal(hashCanonicalJson({ a: 1, b: 2 }), hashCanonicalJson({ b: 2, a: 1 }));
  assert.equal(
    sha256Hex("abc"),
    "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad"
  );
});

test("metrics registry renders counters and gauges with base labels", () => {
  const metrics = createMetricsRegistry({ service: "test" });
  metrics.incCounter("requests_total", { method: "GET" });
  metrics.incCounter("requests_total", { method: "GET" }, 2);
  metrics.setGauge("head_sequence", {}, 7);
  assert.equal(metrics.read("requests_total", { method: "GET" }), 3);
  assert.equal(metrics.read("requests_total", { method: "POST" }), undefined);
  assert.equal(
    metrics.render(),
    [
      "# TYPE requests_total counter",
      'requests_total{method="GET",service="test"} 3',
      "# TYPE head_sequence gauge",
      'head_sequence{service="test"} 7',
      ""
    ].join("\n")
  );
});
