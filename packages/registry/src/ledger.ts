import { failClosed, loadAdmin, mutate, type RegistryContext } from "./context.js";
import { ConflictError, NotFoundError } from "./errors.js";
import { enforce, requireAuthorizedIssuer, requireRevoker } from "./guards.js";
import { deriveCredentialId } from "./identifier.js";
import {
  normalizeCredentialId,
  parseExpiry,
  parseImageHash,
  parsePrincipal
} from "./validation.js";
import type {
  CredentialId,
  CredentialRecord,
  CredentialStatus,
  CredentialView,
  Principal,
  UnixSeconds
} from "./types.js";

export const statusAt = (record: CredentialRecord, now: UnixSeconds): CredentialStatus => {
  if (!record.active) return "revoked";
  return now < record.expiresAt ? "active" : "expired";
};

const credentialNotFound = () => new NotFoundError("credential_not_found", "Credential not found");

export class CredentialLedger {
  constructor(private readonly context: RegistryContext) {}

  async issueMembership(
    caller: Principal,
    imageHash: unknown,
    holder: unknown,
    expiresAt: unknown
  ): Promise<CredentialId> {
    const id = await mutate(this.context, async ({ tx, now, emit }) => {
      enforce(requireAuthorizedIssuer(await tx.isIssuer(caller)));
      const record: CredentialRecord = {
        imageHash: parseImageHash(imageHash),
        holder: parsePrincipal(holder, "holder"),
        issuer: caller,
        issuedAt: now,
        expiresAt: parseExpiry(expiresAt, now),
        active: true
      };
      const nonce =
        this.context.idStrategy === "sequenced" ? await tx.nextIssuanceNonce() : undefined;
      const id = deriveCredentialId({ ...record, nonce });
      if (await tx.getCredential(id)) {
        throw new ConflictError("credential_exists", "Credential identifier already assigned");
      }
      await tx.insertCredential(id, record);
      await emit({ type: "MembershipIssued", id, holder: record.holder, issuer: caller });
      return id;
    });
    this.context.logger.info("membership.issued", { credentialId: id, issuer: caller });
    return id;
  }

  async getCredential(id: unknown): Promise<CredentialRecord> {
    const credentialId = normalizeCredentialId(id);
    const record = credentialId ? await this.context.store.getCredential(credentialId) : null;
    if (!record) throw credentialNotFound();
    return record;
  }

  async getCredentialStatus(id: unknown): Promise<CredentialStatus> {
    return (await this.describeCredential(id)).status;
  }

  /** Record and derived status from a single read. */
  async describeCredential(id: unknown): Promise<CredentialView> {
    const record = await this.getCredential(id);
    return { ...record, status: statusAt(record, this.context.clock()) };
  }

  async revokeMembership(caller: Principal, id: unknown): Promise<void> {
    const credentialId = normalizeCredentialId(id);
    if (!credentialId) throw credentialNotFound();
    await mutate(this.context, async ({ tx, emit }) => {
      const record = await tx.getCredential(credentialId);
      if (!record) throw credentialNotFound();
      enforce(requireRevoker(record, await loadAdmin(tx), caller));
      if (record.active) {
        await tx.deactivateCredential(credentialId);
      }
      await emit({ type: "MembershipRevoked", id: credentialId });
    });
    this.context.logger.info("membership.revoked", { credentialId, caller });
  }

  async isCredentialActive(id: unknown): Promise<boolean> {
    const credentialId = normalizeCredentialId(id);
    if (!credentialId) return false;
    const record = await failClosed(
      this.context,
      "isCredentialActive",
      () => this.context.store.getCredential(credentialId),
      null
    );
    return record !== null && statusAt(record, this.context.clock()) === "active";
  }
}
