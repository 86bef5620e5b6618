import { test } from "node:test";
import assert from "node:assert/strict";

// Keep tests deterministic regardless of developer `.env`.
process.env.NODE_ENV = "test";
process.env.REGISTRY_ADMIN = "admin-a";
process.env.REGISTRY_STORE = "memory";
process.env.SERVICE_JWT_SECRET = "test-secret-registry-0123456789abcdef";
process.env.ALLOW_INSECURE_DEV_AUTH = "false";
process.env.RATE_LIMIT_PER_MINUTE = "1";

const { buildServer } = await import("./server.js");

test("requests beyond the configured rate are refused", async () => {
  const app = await buildServer();
  await app.ready();

  const statuses: number[] = [];
  for (let i = 0; i < 3; i += 1) {
    const response = await app.inject({ method: "GET", url: "/v1/issuers" });
    statuses.push(response.statusCode);
  }
  assert.deepEqual(statuses, [200, 429, 429]);

  const limited = await app.inject({ method: "GET", url: "/v1/issuers" });
  assert.equal(limited.json().error, "rate_limited");

  await app.close();
});
