import { z } from "zod";

export type Principal = string & {};

/** 32-byte digest as 64 lowercase hex characters. */
export type Hash32 = string & {};

export type CredentialId = string & {};

export type UnixSeconds = number;

export type Clock = () => UnixSeconds;

export const systemClock: Clock = () => Math.floor(Date.now() / 1000);

export type CredentialRecord = {
  imageHash: Hash32;
  holder: Principal;
  issuer: Principal;
  issuedAt: UnixSeconds;
  expiresAt: UnixSeconds;
  // One-way revocation marker; expiry is derived from the clock and never stored here.
  active: boolean;
};

export type CredentialStatus = "active" | "revoked" | "expired";

export type CredentialView = CredentialRecord & { status: CredentialStatus };

export type IdentifierStrategy = "sequenced" | "deterministic";

export const RegistryEventSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("MembershipIssued"),
    id: z.string(),
    holder: z.string(),
    issuer: z.string()
  }),
  z.object({ type: z.literal("MembershipRevoked"), id: z.string() }),
  z.object({ type: z.literal("IssuerAuthorized"), issuer: z.string() }),
  z.object({ type: z.literal("IssuerRevoked"), issuer: z.string() })
]);

export type RegistryEvent = z.infer<typeof RegistryEventSchema>;

export type RegistryEventType = RegistryEvent["type"];

export type RecordedEvent = {
  sequence: number;
  recordedAt: UnixSeconds;
  event: RegistryEvent;
  dataHash: string;
  prevHash: string | null;
  chainHash: string;
};

export type EventHead = {
  sequence: number;
  chainHash: string;
};
