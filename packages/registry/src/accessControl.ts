import { loadAdmin, failClosed, mutate, type RegistryContext } from "./context.js";
import { enforce, requireAdmin, requireNotAdmin } from "./guards.js";
import { normalizePrincipal, parsePrincipal } from "./validation.js";
import type { Principal } from "./types.js";

export class AccessControlManager {
  constructor(private readonly context: RegistryContext) {}

  async authorizeIssuer(caller: Principal, issuer: unknown): Promise<void> {
    await mutate(this.context, async ({ tx, emit }) => {
      enforce(requireAdmin(await loadAdmin(tx), caller));
      const principal = parsePrincipal(issuer, "issuer");
      await tx.setIssuer(principal, true);
      await emit({ type: "IssuerAuthorized", issuer: principal });
    });
  }

  async revokeIssuer(caller: Principal, issuer: unknown): Promise<void> {
    await mutate(this.context, async ({ tx, emit }) => {
      const admin = await loadAdmin(tx);
      enforce(requireAdmin(admin, caller));
      const principal = parsePrincipal(issuer, "issuer");
      enforce(requireNotAdmin(admin, principal));
      await tx.setIssuer(principal, false);
      await emit({ type: "IssuerRevoked", issuer: principal });
    });
  }

  async isAuthorizedIssuer(issuer: unknown): Promise<boolean> {
    const principal = normalizePrincipal(issuer);
    if (!principal) return false;
    return failClosed(
      this.context,
      "isAuthorizedIssuer",
      () => this.context.store.isIssuer(principal),
      false
    );
  }

  listAuthorizedIssuers(): Promise<Principal[]> {
    return this.context.store.listIssuers();
  }

  getAdmin(): Promise<Principal> {
    return loadAdmin(this.context.store);
  }
}
