export {
  createServiceJwt,
  extractBearerToken,
  readTokenScopes,
  verifyServiceJwt
} from "./serviceAuth.js";
export type { ServiceCaller } from "./serviceAuth.js";
export { canonicalizeJson } from "./canonicalJson.js";
export { hashCanonicalJson, sha256Hex } from "./hashing.js";
export { makeErrorResponse } from "./errors.js";
export type { ErrorCode, ErrorResponse } from "./errors.js";
export { createMetricsRegistry } from "./metrics.js";
export type { MetricLabels, MetricsRegistry } from "./metrics.js";
export { createLogger, redact } from "./log.js";
export type { LogMeta, Logger } from "./log.js";
