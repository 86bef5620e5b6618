import { FastifyInstance } from "fastify";
import { z } from "zod";
import { DEFAULT_EVENT_PAGE } from "@membership-ledger/registry";
import { getRegistry } from "../registry.js";

const querySchema = z.object({
  after: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(DEFAULT_EVENT_PAGE).default(100)
});

export const registerEventRoutes = (app: FastifyInstance) => {
  app.get("/v1/events", async (request, reply) => {
    const query = querySchema.parse(request.query ?? {});
    const registry = await getRegistry();
    const events = await registry.readEvents({ afterSequence: query.after, limit: query.limit });
    return reply.send({ events });
  });

  app.get("/v1/events/verify", async (_request, reply) => {
    const registry = await getRegistry();
    return reply.send(await registry.verifyEventChain());
  });
};
