import { SignJWT, jwtVerify, type JWTPayload } from "jose";

const textEncoder = new TextEncoder();

export type ServiceCaller = {
  principal: string;
  scopes: string[];
  payload: JWTPayload;
};

export const extractBearerToken = (authHeader?: string) => {
  if (!authHeader?.startsWith("Bearer ")) {
    return null;
  }
  return authHeader.slice(7);
};

export const readTokenScopes = (payload: JWTPayload) => {
  const scopeValue = payload.scope;
  return Array.isArray(scopeValue)
    ? scopeValue.map(String)
    : typeof scopeValue === "string"
      ? scopeValue.split(" ").filter(Boolean)
      : [];
};

/**
 * Verifies an HS256 caller token and resolves the principal it speaks for.
 * The `sub` claim is the principal; `exp` and `aud` are mandatory.
 */
export const verifyServiceJwt = async (
  token: string,
  options: {
    audience: string;
    secret: string;
    issuer?: string;
    requiredScopes?: string[];
  }
): Promise<ServiceCaller> => {
  const key = textEncoder.encode(options.secret);
  const { payload } = await jwtVerify(token, key, {
    audience: options.audience,
    issuer: options.issuer,
    algorithms: ["HS256"]
  });
  if (!payload.exp || !payload.aud) {
    throw new Error("jwt_missing_required_claims");
  }
  const principal = typeof payload.sub === "string" ? payload.sub.trim() : "";
  if (!principal) {
    throw new Error("jwt_missing_subject");
  }
  const tokenScopes = readTokenScopes(payload);
  if (options.requiredScopes && options.requiredScopes.length > 0) {
    if (!options.requiredScopes.every((scope) => tokenScopes.includes(scope))) {
      throw new Error("jwt_missing_required_scope");
    }
  }
  return { principal, scopes: tokenScopes, payload };
};

export const createServiceJwt = async (input: {
  audience: string;
  secret: string;
  subject: string;
  ttlSeconds: number;
  scope: string[] | string;
  issuer?: string;
}) => {
  const nowSeconds = Math.floor(Date.now() / 1000);
  const key = textEncoder.encode(input.secret);
  const builder = new SignJWT({ scope: input.scope })
    .setProtectedHeader({ alg: "HS256", typ: "JWT" })
    .setAudience(input.audience)
    .setSubject(input.subject)
    .setIssuedAt(nowSeconds)
    .setExpirationTime(nowSeconds + input.ttlSeconds);
  if (input.issuer) builder.setIssuer(input.issuer);
  return builder.sign(key);
};
