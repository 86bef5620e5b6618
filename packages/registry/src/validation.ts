import { z } from "zod";
import { ValidationError } from "./errors.js";
import type { CredentialId, Hash32, Principal, UnixSeconds } from "./types.js";

const HEX_64 = /^[0-9a-f]{64}$/;
const ZERO_HASH = "0".repeat(64);

export const PrincipalSchema = z.string().trim().min(1).max(256);

export const Hash32Schema = z
  .string()
  .trim()
  .transform((value) => value.toLowerCase().replace(/^0x/, ""))
  .pipe(z.string().regex(HEX_64));

export const CredentialIdSchema = Hash32Schema;

export const ExpirySchema = z.number().int().safe();

export const isZeroHash = (hash: Hash32) => hash === ZERO_HASH;

export const parsePrincipal = (value: unknown, field: string): Principal => {
  const parsed = PrincipalSchema.safeParse(value);
  if (!parsed.success) {
    throw new ValidationError(`${field}_invalid`, `${field} must be a non-empty principal`);
  }
  return parsed.data;
};

export const parseImageHash = (value: unknown): Hash32 => {
  const parsed = Hash32Schema.safeParse(value);
  if (!parsed.success) {
    throw new ValidationError("image_hash_invalid", "imageHash must be a 32-byte hex digest");
  }
  if (isZeroHash(parsed.data)) {
    throw new ValidationError("image_hash_zero", "imageHash must not be the zero digest");
  }
  return parsed.data;
};

export const parseExpiry = (value: unknown, now: UnixSeconds): UnixSeconds => {
  const parsed = ExpirySchema.safeParse(value);
  if (!parsed.success) {
    throw new ValidationError("expires_at_invalid", "expiresAt must be integer unix seconds");
  }
  if (parsed.data <= now) {
    throw new ValidationError("expires_at_not_future", "expiresAt must be in the future");
  }
  return parsed.data;
};

/** Lenient forms for query paths, which never raise. */
export const normalizePrincipal = (value: unknown): Principal | null => {
  const parsed = PrincipalSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
};

export const normalizeHash = (value: unknown): Hash32 | null => {
  const parsed = Hash32Schema.safeParse(value);
  return parsed.success ? parsed.data : null;
};

export const normalizeCredentialId = (value: unknown): CredentialId | null => {
  const parsed = CredentialIdSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
};
