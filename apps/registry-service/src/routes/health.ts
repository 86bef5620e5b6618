import { FastifyInstance } from "fastify";
import { log } from "../log.js";
import { metrics } from "../metrics.js";
import { getRegistry } from "../registry.js";

export const registerHealthRoutes = (app: FastifyInstance) => {
  app.get("/healthz", async (_request, reply) => {
    try {
      const registry = await getRegistry();
      const head = await registry.getEventHead();
      return {
        ok: true,
        store: { ok: true },
        eventLog: { headSequence: head?.sequence ?? 0, headHash: head?.chainHash ?? null }
      };
    } catch (error) {
      log.error("health.store.failed", { error });
      return reply.code(503).send({ ok: false, store: { ok: false }, error: "store_unavailable" });
    }
  });

  app.get("/metrics", async (_request, reply) => {
    const registry = await getRegistry();
    const head = await registry.getEventHead();
    metrics.setGauge("registry_event_head_sequence", {}, head?.sequence ?? 0);
    reply.header("content-type", "text/plain; version=0.0.4");
    return reply.send(metrics.render());
  });
};
