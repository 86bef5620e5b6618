import { FastifyReply, FastifyRequest } from "fastify";
import { extractBearerToken, makeErrorResponse, verifyServiceJwt } from "@membership-ledger/shared";
import type { Principal } from "@membership-ledger/registry";
import { config } from "./config.js";
import { log } from "./log.js";

const INSECURE_CALLER_HEADER = "x-caller";

const verifyWithRotation = async (token: string, requiredScopes?: string[]) => {
  const secrets = [config.SERVICE_JWT_SECRET, config.SERVICE_JWT_SECRET_NEXT].filter(
    (secret): secret is string => Boolean(secret)
  );
  let lastError: unknown = new Error("service_auth_not_configured");
  for (const secret of secrets) {
    try {
      return await verifyServiceJwt(token, {
        audience: config.SERVICE_JWT_AUDIENCE,
        secret,
        requiredScopes
      });
    } catch (error) {
      // A scope failure means the signature matched; trying the next secret cannot help.
      if (error instanceof Error && error.message === "jwt_missing_required_scope") {
        throw error;
      }
      lastError = error;
    }
  }
  throw lastError;
};

/**
 * Resolves the calling principal for a mutating route. On failure the reply is sent and `null`
 * is returned; handlers stop when `reply.sent` is set.
 */
export const requireCaller = async (
  request: FastifyRequest,
  reply: FastifyReply,
  options?: { requiredScopes?: string[] }
): Promise<Principal | null> => {
  if (!config.SERVICE_JWT_SECRET && config.ALLOW_INSECURE_DEV_AUTH) {
    const header = request.headers[INSECURE_CALLER_HEADER];
    const caller = (Array.isArray(header) ? header[0] : header)?.trim();
    if (caller) {
      log.warn("service.auth.insecure_caller", { requestId: request.requestId, caller });
      return caller;
    }
  }
  if (!config.SERVICE_JWT_SECRET) {
    await reply.code(503).send(
      makeErrorResponse("service_auth_not_configured", "Service authentication is not configured", {
        devMode: config.DEV_MODE
      })
    );
    return null;
  }
  const token = extractBearerToken(request.headers.authorization);
  if (!token) {
    await reply.code(401).send(
      makeErrorResponse("caller_unauthenticated", "Missing caller token", {
        devMode: config.DEV_MODE
      })
    );
    return null;
  }
  try {
    const caller = await verifyWithRotation(token, options?.requiredScopes);
    log.info("service.auth.ok", {
      requestId: request.requestId,
      caller: caller.principal,
      scope: caller.scopes
    });
    return caller.principal;
  } catch (error) {
    if (error instanceof Error && error.message === "jwt_missing_required_scope") {
      await reply.code(403).send(
        makeErrorResponse("service_auth_scope_missing", "Caller token scope missing", {
          devMode: config.DEV_MODE
        })
      );
      return null;
    }
    log.warn("service.auth.rejected", { requestId: request.requestId, error });
    await reply.code(401).send(
      makeErrorResponse("caller_unauthenticated", "Invalid caller token", {
        devMode: config.DEV_MODE,
        debug: config.DEV_MODE
          ? { cause: error instanceof Error ? error.message : "Error" }
          : undefined
      })
    );
    return null;
  }
};
