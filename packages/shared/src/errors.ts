export type ErrorCode =
  | "invalid_request"
  | "not_found"
  | "forbidden"
  | "conflict"
  | "invariant_violation"
  | "service_auth_not_configured"
  | "service_auth_scope_missing"
  | "caller_unauthenticated"
  | "rate_limited"
  | "store_unavailable"
  | "internal_error";

export type ErrorResponse = {
  error: ErrorCode;
  message: string;
  details?: string;
  debug?: { cause?: string; hint?: string };
};

type ErrorOptions = {
  details?: string;
  debug?: { cause?: string; hint?: string };
  devMode?: boolean;
};

export const makeErrorResponse = (
  error: ErrorCode,
  message: string,
  options: ErrorOptions = {}
): ErrorResponse => {
  const response: ErrorResponse = { error, message };
  if (options.details) {
    response.details = options.details;
  }
  if (options.devMode && options.debug) {
    response.debug = options.debug;
  }
  return response;
};
