import { FastifyInstance } from "fastify";
import { z } from "zod";
import { normalizeCredentialId } from "@membership-ledger/registry";
import { requireCaller } from "../auth.js";
import { log } from "../log.js";
import { metrics } from "../metrics.js";
import { getRegistry } from "../registry.js";

const WRITE_SCOPE = "membership:write";

const issueSchema = z.object({
  imageHash: z.string(),
  holder: z.string(),
  expiresAt: z.number()
});

const verifySchema = z.object({
  imageHash: z.string()
});

const idParamsSchema = z.object({
  id: z.string().min(1)
});

export const registerMembershipRoutes = (app: FastifyInstance) => {
  app.post("/v1/memberships", async (request, reply) => {
    const caller = await requireCaller(request, reply, { requiredScopes: [WRITE_SCOPE] });
    if (reply.sent || !caller) return;
    const body = issueSchema.parse(request.body);
    const registry = await getRegistry();
    const credentialId = await registry.issueMembership(
      caller,
      body.imageHash,
      body.holder,
      body.expiresAt
    );
    log.info("membership.issue.ok", {
      requestId: request.requestId,
      credentialId,
      issuer: caller
    });
    return reply.code(201).send({ credentialId });
  });

  app.get("/v1/memberships/:id", async (request, reply) => {
    reply.header("cache-control", "no-store");
    const params = idParamsSchema.parse(request.params);
    const registry = await getRegistry();
    const view = await registry.describeCredential(params.id);
    return reply.send({ credentialId: normalizeCredentialId(params.id), ...view });
  });

  app.post("/v1/memberships/:id/revoke", async (request, reply) => {
    const caller = await requireCaller(request, reply, { requiredScopes: [WRITE_SCOPE] });
    if (reply.sent || !caller) return;
    const params = idParamsSchema.parse(request.params);
    const registry = await getRegistry();
    await registry.revokeMembership(caller, params.id);
    log.info("membership.revoke.ok", {
      requestId: request.requestId,
      credentialId: params.id,
      caller
    });
    return reply.send({ revoked: true });
  });

  app.post("/v1/memberships/:id/verify", async (request, reply) => {
    reply.header("cache-control", "no-store");
    const params = idParamsSchema.parse(request.params);
    const body = verifySchema.parse(request.body);
    const registry = await getRegistry();
    const valid = await registry.verifyMembership(params.id, body.imageHash);
    metrics.incCounter("verifications_total", { result: valid ? "valid" : "invalid" });
    return reply.send({ valid });
  });

  app.get("/v1/memberships/:id/active", async (request, reply) => {
    reply.header("cache-control", "no-store");
    const params = idParamsSchema.parse(request.params);
    const registry = await getRegistry();
    return reply.send({ active: await registry.isCredentialActive(params.id) });
  });
};
