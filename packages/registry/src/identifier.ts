import { hashCanonicalJson } from "@membership-ledger/shared";
import type { CredentialId, Hash32, Principal, UnixSeconds } from "./types.js";

export type IssuanceContext = {
  imageHash: Hash32;
  holder: Principal;
  issuer: Principal;
  issuedAt: UnixSeconds;
  // Ledger issuance sequence; omitted for the deterministic derivation.
  nonce?: number;
};

export const deriveCredentialId = (context: IssuanceContext): CredentialId =>
  hashCanonicalJson({
    imageHash: context.imageHash,
    holder: context.holder,
    issuer: context.issuer,
    issuedAt: context.issuedAt,
    nonce: context.nonce
  });
