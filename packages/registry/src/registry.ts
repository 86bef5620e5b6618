import { AccessControlManager } from "./accessControl.js";
import { mutate, type RegistryContext } from "./context.js";
import { InvariantViolation } from "./errors.js";
import {
  RegistryEventBus,
  checkEventChain,
  type ChainCheck,
  type EventListener
} from "./eventLog.js";
import { CredentialLedger } from "./ledger.js";
import { consoleLogger, type RegistryLogger } from "./log.js";
import { DEFAULT_EVENT_PAGE, type ReadEventsOptions, type RegistryStore } from "./store.js";
import { parsePrincipal } from "./validation.js";
import { VerificationEngine } from "./verification.js";
import {
  systemClock,
  type Clock,
  type CredentialId,
  type CredentialRecord,
  type CredentialStatus,
  type CredentialView,
  type EventHead,
  type IdentifierStrategy,
  type Principal,
  type RecordedEvent
} from "./types.js";

export type MembershipRegistryOptions = {
  store: RegistryStore;
  admin: Principal;
  clock?: Clock;
  idStrategy?: IdentifierStrategy;
  logger?: RegistryLogger;
};

/**
 * Single entry point over the three registry components. Mutations go through access control and
 * the ledger inside one store transaction; queries read committed state directly.
 */
export class MembershipRegistry {
  readonly access: AccessControlManager;
  readonly ledger: CredentialLedger;
  readonly verifier: VerificationEngine;

  private constructor(private readonly context: RegistryContext) {
    this.access = new AccessControlManager(context);
    this.ledger = new CredentialLedger(context);
    this.verifier = new VerificationEngine(context);
  }

  /**
   * Opens a registry over `store`. An empty store is initialized with `admin` as admin and first
   * authorized issuer; a store that already has a different admin is refused.
   */
  static async open(options: MembershipRegistryOptions): Promise<MembershipRegistry> {
    const logger = options.logger ?? consoleLogger;
    const context: RegistryContext = {
      store: options.store,
      clock: options.clock ?? systemClock,
      bus: new RegistryEventBus(logger),
      logger,
      idStrategy: options.idStrategy ?? "sequenced"
    };
    const admin = parsePrincipal(options.admin, "admin");
    const initialized = await mutate(context, async ({ tx, emit }) => {
      const existing = await tx.getAdmin();
      if (existing !== null) {
        if (existing !== admin) {
          throw new InvariantViolation(
            "admin_immutable",
            "Registry admin is fixed at initialization"
          );
        }
        return false;
      }
      await tx.putAdmin(admin);
      await tx.setIssuer(admin, true);
      await emit({ type: "IssuerAuthorized", issuer: admin });
      return true;
    });
    logger.info(initialized ? "registry.initialized" : "registry.opened", { admin });
    return new MembershipRegistry(context);
  }

  issueMembership(
    caller: Principal,
    imageHash: unknown,
    holder: unknown,
    expiresAt: unknown
  ): Promise<CredentialId> {
    return this.ledger.issueMembership(caller, imageHash, holder, expiresAt);
  }

  verifyMembership(id: unknown, imageHash: unknown): Promise<boolean> {
    return this.verifier.verifyMembership(id, imageHash);
  }

  getCredential(id: unknown): Promise<CredentialRecord> {
    return this.ledger.getCredential(id);
  }

  getCredentialStatus(id: unknown): Promise<CredentialStatus> {
    return this.ledger.getCredentialStatus(id);
  }

  describeCredential(id: unknown): Promise<CredentialView> {
    return this.ledger.describeCredential(id);
  }

  revokeMembership(caller: Principal, id: unknown): Promise<void> {
    return this.ledger.revokeMembership(caller, id);
  }

  authorizeIssuer(caller: Principal, issuer: unknown): Promise<void> {
    return this.access.authorizeIssuer(caller, issuer);
  }

  revokeIssuer(caller: Principal, issuer: unknown): Promise<void> {
    return this.access.revokeIssuer(caller, issuer);
  }

  isAuthorizedIssuer(issuer: unknown): Promise<boolean> {
    return this.access.isAuthorizedIssuer(issuer);
  }

  isCredentialActive(id: unknown): Promise<boolean> {
    return this.ledger.isCredentialActive(id);
  }

  listAuthorizedIssuers(): Promise<Principal[]> {
    return this.access.listAuthorizedIssuers();
  }

  getAdmin(): Promise<Principal> {
    return this.access.getAdmin();
  }

  subscribe(listener: EventListener): () => void {
    return this.context.bus.subscribe(listener);
  }

  readEvents(options?: ReadEventsOptions): Promise<RecordedEvent[]> {
    return this.context.store.readEvents(options);
  }

  getEventHead(): Promise<EventHead | null> {
    return this.context.store.getEventHead();
  }

  async verifyEventChain(): Promise<ChainCheck> {
    let head: EventHead | null = null;
    for (;;) {
      const page = await this.context.store.readEvents({
        afterSequence: head?.sequence ?? 0,
        limit: DEFAULT_EVENT_PAGE
      });
      if (page.length === 0) return { ok: true, head };
      const check = checkEventChain(page, head);
      if (!check.ok) return check;
      head = check.head;
    }
  }

  close(): Promise<void> {
    return this.context.store.close();
  }
}
