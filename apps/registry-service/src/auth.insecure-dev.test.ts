import { test } from "node:test";
import assert from "node:assert/strict";

// Keep tests deterministic regardless of developer `.env`.
process.env.NODE_ENV = "development";
process.env.REGISTRY_ADMIN = "admin-a";
process.env.REGISTRY_STORE = "memory";
process.env.ALLOW_INSECURE_DEV_AUTH = "true";
process.env.SERVICE_BIND_ADDRESS = "127.0.0.1";
delete process.env.SERVICE_JWT_SECRET;
delete process.env.SERVICE_JWT_SECRET_NEXT;

const { buildServer } = await import("./server.js");

test("loopback development accepts the caller header", async () => {
  const app = await buildServer();
  await app.ready();

  const withHeader = await app.inject({
    method: "POST",
    url: "/v1/issuers",
    headers: { "x-caller": "admin-a" },
    payload: { issuer: "issuer-2" }
  });
  assert.equal(withHeader.statusCode, 200);
  assert.deepEqual(withHeader.json(), { authorized: true });

  const spoofed = await app.inject({
    method: "POST",
    url: "/v1/issuers",
    headers: { "x-caller": "issuer-2" },
    payload: { issuer: "issuer-3" }
  });
  assert.equal(spoofed.statusCode, 403);

  const withoutHeader = await app.inject({
    method: "POST",
    url: "/v1/issuers",
    payload: { issuer: "issuer-3" }
  });
  assert.equal(withoutHeader.statusCode, 503);
  assert.equal(withoutHeader.json().error, "service_auth_not_configured");

  await app.close();
});
