import { FastifyInstance } from "fastify";
import { z } from "zod";
import { requireCaller } from "../auth.js";
import { log } from "../log.js";
import { getRegistry } from "../registry.js";

const MANAGE_SCOPE = "issuer:manage";

const authorizeSchema = z.object({
  issuer: z.string()
});

const issuerParamsSchema = z.object({
  issuer: z.string().min(1)
});

export const registerIssuerRoutes = (app: FastifyInstance) => {
  app.get("/v1/issuers", async (_request, reply) => {
    const registry = await getRegistry();
    return reply.send({
      admin: await registry.getAdmin(),
      issuers: await registry.listAuthorizedIssuers()
    });
  });

  app.get("/v1/issuers/:issuer", async (request, reply) => {
    const params = issuerParamsSchema.parse(request.params);
    const registry = await getRegistry();
    return reply.send({ authorized: await registry.isAuthorizedIssuer(params.issuer) });
  });

  app.post("/v1/issuers", async (request, reply) => {
    const caller = await requireCaller(request, reply, { requiredScopes: [MANAGE_SCOPE] });
    if (reply.sent || !caller) return;
    const body = authorizeSchema.parse(request.body);
    const registry = await getRegistry();
    await registry.authorizeIssuer(caller, body.issuer);
    log.info("issuer.authorize.ok", { requestId: request.requestId, issuer: body.issuer });
    return reply.send({ authorized: true });
  });

  app.delete("/v1/issuers/:issuer", async (request, reply) => {
    const caller = await requireCaller(request, reply, { requiredScopes: [MANAGE_SCOPE] });
    if (reply.sent || !caller) return;
    const params = issuerParamsSchema.parse(request.params);
    const registry = await getRegistry();
    await registry.revokeIssuer(caller, params.issuer);
    log.info("issuer.revoke.ok", { requestId: request.requestId, issuer: params.issuer });
    return reply.send({ authorized: false });
  });
};
