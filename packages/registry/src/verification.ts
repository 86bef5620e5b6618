import { failClosed, type RegistryContext } from "./context.js";
import { statusAt } from "./ledger.js";
import { normalizeCredentialId, normalizeHash } from "./validation.js";

/**
 * Read-only membership check. Every failing condition, including an unknown identifier, yields the
 * same `false` so callers cannot probe which identifiers exist.
 */
export class VerificationEngine {
  constructor(private readonly context: RegistryContext) {}

  async verifyMembership(id: unknown, imageHash: unknown): Promise<boolean> {
    const credentialId = normalizeCredentialId(id);
    const hash = normalizeHash(imageHash);
    if (!credentialId || !hash) return false;
    const record = await failClosed(
      this.context,
      "verifyMembership",
      () => this.context.store.getCredential(credentialId),
      null
    );
    if (!record) return false;
    return statusAt(record, this.context.clock()) === "active" && record.imageHash === hash;
  }
}
