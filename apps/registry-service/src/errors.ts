import { makeErrorResponse, type ErrorCode } from "@membership-ledger/shared";
import type { RegistryError, RegistryErrorCode } from "@membership-ledger/registry";
import { config } from "./config.js";

const REGISTRY_ERRORS: Record<RegistryErrorCode, { statusCode: number; error: ErrorCode }> = {
  validation_error: { statusCode: 400, error: "invalid_request" },
  authorization_error: { statusCode: 403, error: "forbidden" },
  not_found: { statusCode: 404, error: "not_found" },
  conflict: { statusCode: 409, error: "conflict" },
  invariant_violation: { statusCode: 409, error: "invariant_violation" }
};

export const toHttpError = (error: RegistryError) => {
  const mapped = REGISTRY_ERRORS[error.code];
  return {
    statusCode: mapped.statusCode,
    body: makeErrorResponse(mapped.error, error.message, {
      details: error.reason,
      devMode: config.DEV_MODE
    })
  };
};
