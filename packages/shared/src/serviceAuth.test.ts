import { strict as assert } from "node:assert";
import { SignJWT } from "jose";
import { createServiceJwt, extractBearerToken, verifyServiceJwt } from "./serviceAuth.js";

const signAnonymous = (secret: string, aud: string) =>
  new SignJWT({})
    .setProtectedHeader({ alg: "HS256" })
    .setAudience(aud)
    .setIssuedAt()
    .setExpirationTime("2m")
    .sign(new TextEncoder().encode(secret));

const run = async () => {
  const secret = "test-secret-0123456789abcdef-0123456789";
  const goodAud = "membership-ledger.registry";

  assert.equal(extractBearerToken("Bearer abc.def"), "abc.def");
  assert.equal(extractBearerToken("Basic abc"), null);
  assert.equal(extractBearerToken(undefined), null);

  const token = await createServiceJwt({
    audience: goodAud,
    secret,
    subject: "issuer-a",
    ttlSeconds: 120,
    scope: ["registry:write"]
  });
  const caller = await verifyServiceJwt(token, {
    audience: goodAud,
    secret,
    requiredScopes: ["registry:write"]
  });
  assert.equal(caller.principal, "issuer-a");
  assert.deepEqual(caller.scopes, ["registry:write"]);

  let rejected = false;
  try {
    await verifyServiceJwt(token, { audience: "other.audience", secret });
  } catch {
    rejected = true;
  }
  assert.equal(rejected, true, "wrong audience should be rejected");

  rejected = false;
  try {
    await verifyServiceJwt(token, { audience: goodAud, secret: `${secret}-other` });
  } catch {
    rejected = true;
  }
  assert.equal(rejected, true, "wrong secret should be rejected");

  let reason = "";
  try {
    await verifyServiceJwt(token, {
      audience: goodAud,
      secret,
      requiredScopes: ["registry:admin"]
    });
  } catch (error) {
    reason = error instanceof Error ? error.message : "";
  }
  assert.equal(reason, "jwt_missing_required_scope", "wrong scope should be rejected");

  const spaced = await createServiceJwt({
    audience: goodAud,
    secret,
    subject: "issuer-b",
    ttlSeconds: 120,
    scope: "registry:write registry:read"
  });
  const spacedCaller = await verifyServiceJwt(spaced, { audience: goodAud, secret });
  assert.deepEqual(spacedCaller.scopes, ["registry:write", "registry:read"]);

  const anonymous = await signAnonymous(secret, goodAud);
  reason = "";
  try {
    await verifyServiceJwt(anonymous, { audience: goodAud, secret });
  } catch (error) {
    reason = error instanceof Error ? error.message : "";
  }
  assert.equal(reason, "jwt_missing_subject", "token without subject should be rejected");
};

run().catch((error) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
