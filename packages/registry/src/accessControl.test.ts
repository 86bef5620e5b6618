import { test } from "node:test";
import assert from "node:assert/strict";
import { MembershipRegistry } from "./registry.js";
import { MemoryRegistryStore } from "./memoryStore.js";
import { AuthorizationError, InvariantViolation, ValidationError } from "./errors.js";
import { ADMIN, captureLogger, manualClock } from "./testing.js";

const openRegistry = () =>
  MembershipRegistry.open({
    store: new MemoryRegistryStore(),
    admin: ADMIN,
    clock: manualClock(),
    logger: captureLogger().logger
  });

test("the initializer is admin and first authorized issuer", async () => {
  const registry = await openRegistry();
  assert.equal(await registry.getAdmin(), ADMIN);
  assert.equal(await registry.isAuthorizedIssuer(ADMIN), true);
  assert.deepEqual(await registry.listAuthorizedIssuers(), [ADMIN]);

  const [first] = await registry.readEvents();
  assert.equal(first?.sequence, 1);
  assert.deepEqual(first?.event, { type: "IssuerAuthorized", issuer: ADMIN });
});

test("authorizing is admin-only and idempotent", async () => {
  const registry = await openRegistry();

  await registry.authorizeIssuer(ADMIN, "issuer-2");
  await registry.authorizeIssuer(ADMIN, "issuer-2");
  assert.equal(await registry.isAuthorizedIssuer("issuer-2"), true);
  assert.deepEqual(await registry.listAuthorizedIssuers(), [ADMIN, "issuer-2"]);

  await assert.rejects(registry.authorizeIssuer("issuer-2", "issuer-3"), AuthorizationError);
  assert.equal(await registry.isAuthorizedIssuer("issuer-3"), false);

  const authorized = (await registry.readEvents()).filter(
    (entry) => entry.event.type === "IssuerAuthorized"
  );
  assert.equal(authorized.length, 3);
});

test("issuer revocation is admin-only and idempotent", async () => {
  const registry = await openRegistry();
  await registry.authorizeIssuer(ADMIN, "issuer-2");

  await assert.rejects(registry.revokeIssuer("issuer-2", "issuer-2"), AuthorizationError);
  assert.equal(await registry.isAuthorizedIssuer("issuer-2"), true);

  await registry.revokeIssuer(ADMIN, "issuer-2");
  await registry.revokeIssuer(ADMIN, "never-authorized");
  assert.equal(await registry.isAuthorizedIssuer("issuer-2"), false);
  assert.equal(await registry.isAuthorizedIssuer("never-authorized"), false);
  assert.deepEqual(await registry.listAuthorizedIssuers(), [ADMIN]);

  const types = (await registry.readEvents()).map((entry) => entry.event);
  assert.deepEqual(types.slice(-2), [
    { type: "IssuerRevoked", issuer: "issuer-2" },
    { type: "IssuerRevoked", issuer: "never-authorized" }
  ]);
});

test("the admin can never lose issuer status", async () => {
  const registry = await openRegistry();
  await assert.rejects(
    registry.revokeIssuer(ADMIN, ADMIN),
    (error) => error instanceof InvariantViolation && error.reason === "admin_not_revocable"
  );
  assert.equal(await registry.isAuthorizedIssuer(ADMIN), true);
  assert.equal((await registry.readEvents()).length, 1);
});

test("non-admin callers get AuthorizationError even for the admin target", async () => {
  const registry = await openRegistry();
  await assert.rejects(
    registry.revokeIssuer("intruder", ADMIN),
    (error) => error instanceof AuthorizationError && error.reason === "caller_not_admin"
  );
});

test("issuer principals are validated", async () => {
  const registry = await openRegistry();
  await assert.rejects(
    registry.authorizeIssuer(ADMIN, ""),
    (error) => error instanceof ValidationError && error.reason === "issuer_invalid"
  );
  await assert.rejects(registry.authorizeIssuer(ADMIN, "x".repeat(257)), ValidationError);
  assert.equal(await registry.isAuthorizedIssuer(""), false);
  assert.equal(await registry.isAuthorizedIssuer(null), false);
});
