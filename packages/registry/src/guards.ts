import { AuthorizationError, InvariantViolation, type RegistryError } from "./errors.js";
import type { CredentialRecord, Principal } from "./types.js";

export type GuardResult = { ok: true } | { ok: false; error: RegistryError };

const pass: GuardResult = { ok: true };

const fail = (error: RegistryError): GuardResult => ({ ok: false, error });

export const requireAdmin = (admin: Principal, caller: Principal): GuardResult =>
  caller === admin
    ? pass
    : fail(new AuthorizationError("caller_not_admin", "Only the admin may manage issuers"));

export const requireAuthorizedIssuer = (authorized: boolean): GuardResult =>
  authorized
    ? pass
    : fail(new AuthorizationError("caller_not_issuer", "Caller is not an authorized issuer"));

export const requireRevoker = (
  record: CredentialRecord,
  admin: Principal,
  caller: Principal
): GuardResult =>
  caller === record.issuer || caller === admin
    ? pass
    : fail(
        new AuthorizationError(
          "caller_not_revoker",
          "Only the issuing principal or the admin may revoke"
        )
      );

export const requireNotAdmin = (admin: Principal, issuer: Principal): GuardResult =>
  issuer === admin
    ? fail(new InvariantViolation("admin_not_revocable", "The admin cannot lose issuer status"))
    : pass;

export const enforce = (...results: GuardResult[]) => {
  for (const result of results) {
    if (!result.ok) throw result.error;
  }
};
