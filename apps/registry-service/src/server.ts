import fastify from "fastify";
import rateLimit from "@fastify/rate-limit";
import { randomUUID } from "node:crypto";
import net from "node:net";
import { ZodError } from "zod";
import { isRegistryError } from "@membership-ledger/registry";
import { makeErrorResponse } from "@membership-ledger/shared";
import { config } from "./config.js";
import { toHttpError } from "./errors.js";
import { log } from "./log.js";
import { metrics } from "./metrics.js";
import { registerEventRoutes } from "./routes/events.js";
import { registerHealthRoutes } from "./routes/health.js";
import { registerIssuerRoutes } from "./routes/issuers.js";
import { registerMembershipRoutes } from "./routes/memberships.js";

declare module "fastify" {
  interface FastifyRequest {
    requestId?: string;
  }
}

const isLoopbackAddress = (value?: string) => {
  if (!value) return false;
  const trimmed = value.trim().toLowerCase();
  if (trimmed === "localhost" || trimmed === "::1") return true;
  const mapped = trimmed.startsWith("::ffff:") ? trimmed.slice(7) : trimmed;
  if (net.isIP(mapped) === 4) {
    const [a] = mapped.split(".").map((part) => Number(part));
    return a === 127;
  }
  return false;
};

export const isPrivateAddress = (value?: string) => {
  if (!value) return false;
  const trimmed = value.trim().toLowerCase();
  if (trimmed === "localhost" || trimmed === "::1") return true;
  if (trimmed === "0.0.0.0" || trimmed === "::") return false;
  const mapped = trimmed.startsWith("::ffff:") ? trimmed.slice(7) : trimmed;
  const ipType = net.isIP(mapped);
  if (ipType === 4) {
    const [a, b] = mapped.split(".").map((part) => Number(part));
    if (a === 10 || a === 127) return true;
    if (a === 192 && b === 168) return true;
    if (a === 172 && b >= 16 && b <= 31) return true;
    return false;
  }
  if (ipType === 6) {
    return mapped.startsWith("fc") || mapped.startsWith("fd");
  }
  return false;
};

export const buildServer = async () => {
  if (config.NODE_ENV === "production" && !config.TRUST_PROXY) {
    log.error("trust.proxy.required", { env: config.NODE_ENV });
    throw new Error("trust_proxy_required_in_production");
  }
  if (config.NODE_ENV === "production" && !isPrivateAddress(config.SERVICE_BIND_ADDRESS)) {
    log.error("service.bind.public_not_allowed", {
      env: config.NODE_ENV,
      bind: config.SERVICE_BIND_ADDRESS
    });
    throw new Error("public_bind_not_allowed");
  }
  if (!config.SERVICE_JWT_SECRET) {
    const localDevAllowed =
      config.NODE_ENV === "development" && isLoopbackAddress(config.SERVICE_BIND_ADDRESS);
    if (config.ALLOW_INSECURE_DEV_AUTH && localDevAllowed) {
      log.warn("service.auth.insecure_enabled", { env: config.NODE_ENV });
    } else {
      log.error("service.auth.missing", { env: config.NODE_ENV });
      throw new Error("service_auth_not_configured");
    }
  }

  const app = fastify({
    logger: false,
    trustProxy: config.TRUST_PROXY,
    bodyLimit: config.BODY_LIMIT_BYTES
  });

  app.addHook("onRequest", async (request, reply) => {
    const incoming = request.headers["x-request-id"];
    const requestId = Array.isArray(incoming) ? incoming[0] : (incoming ?? randomUUID());
    request.requestId = requestId;
    reply.header("X-Request-Id", requestId);
    log.info("request", {
      requestId,
      method: request.method,
      url: request.url,
      auth: request.headers.authorization ? "present" : "missing"
    });
  });

  app.addHook("onResponse", async (request, reply) => {
    const route = request.routeOptions?.url ?? request.url.split("?")[0];
    metrics.incCounter("requests_total", {
      route,
      method: request.method,
      status: String(reply.statusCode)
    });
  });

  app.setErrorHandler((error, request, reply) => {
    if (isRegistryError(error)) {
      const { statusCode, body } = toHttpError(error);
      log.info("registry.rejected", {
        requestId: request.requestId,
        code: error.code,
        reason: error.reason
      });
      return reply.code(statusCode).send(body);
    }
    if (error instanceof ZodError) {
      const fields = error.issues.map((issue) => issue.path.join(".") || "body");
      return reply.code(400).send(
        makeErrorResponse("invalid_request", "Invalid request", {
          details: `invalid_fields:${[...new Set(fields)].join(",")}`,
          devMode: config.DEV_MODE
        })
      );
    }
    if (error.statusCode === 429) {
      return reply.code(429).send(
        makeErrorResponse("rate_limited", "Too many requests", { devMode: config.DEV_MODE })
      );
    }
    if (error.statusCode && error.statusCode >= 400 && error.statusCode < 500) {
      return reply.code(error.statusCode).send(
        makeErrorResponse("invalid_request", "Invalid request", {
          details: error.message,
          devMode: config.DEV_MODE
        })
      );
    }
    log.error("request.failed", { requestId: request.requestId, error });
    return reply.code(500).send(
      makeErrorResponse("internal_error", "Internal error", {
        devMode: config.DEV_MODE,
        debug: config.DEV_MODE ? { cause: error.message } : undefined
      })
    );
  });

  await app.register(rateLimit, { max: config.RATE_LIMIT_PER_MINUTE, timeWindow: "1 minute" });

  registerHealthRoutes(app);
  registerMembershipRoutes(app);
  registerIssuerRoutes(app);
  registerEventRoutes(app);

  return app;
};
