import { ConflictError, NotFoundError } from "./errors.js";
import { copyEntry } from "./eventLog.js";
import {
  DEFAULT_EVENT_PAGE,
  type ReadEventsOptions,
  type RegistryStore,
  type RegistryTransaction
} from "./store.js";
import type {
  CredentialId,
  CredentialRecord,
  EventHead,
  Principal,
  RecordedEvent
} from "./types.js";

type MemoryState = {
  admin: Principal | null;
  credentials: Map<CredentialId, CredentialRecord>;
  issuers: Map<Principal, boolean>;
  events: RecordedEvent[];
  issuanceNonce: number;
};

const headOf = (events: RecordedEvent[]): EventHead | null => {
  const last = events.at(-1);
  return last ? { sequence: last.sequence, chainHash: last.chainHash } : null;
};

const sortedIssuers = (issuers: Map<Principal, boolean>) =>
  [...issuers.entries()]
    .filter(([, authorized]) => authorized)
    .map(([principal]) => principal)
    .sort();

/**
 * Writes are staged on top of the committed state and published in one synchronous step, so a
 * reader never observes half of a transaction.
 */
class StagedTransaction implements RegistryTransaction {
  admin: Principal | null;
  readonly credentials = new Map<CredentialId, CredentialRecord>();
  readonly issuers = new Map<Principal, boolean>();
  readonly events: RecordedEvent[] = [];
  issuanceNonce: number;

  constructor(private readonly committed: MemoryState) {
    this.admin = committed.admin;
    this.issuanceNonce = committed.issuanceNonce;
  }

  async getAdmin() {
    return this.admin;
  }

  async getCredential(id: CredentialId) {
    const record = this.credentials.get(id) ?? this.committed.credentials.get(id);
    return record ? { ...record } : null;
  }

  async isIssuer(principal: Principal) {
    return this.issuers.get(principal) ?? this.committed.issuers.get(principal) ?? false;
  }

  async listIssuers() {
    return sortedIssuers(new Map([...this.committed.issuers, ...this.issuers]));
  }

  async getEventHead() {
    return headOf(this.events) ?? headOf(this.committed.events);
  }

  async putAdmin(admin: Principal) {
    this.admin = admin;
  }

  async insertCredential(id: CredentialId, record: CredentialRecord) {
    if (this.credentials.has(id) || this.committed.credentials.has(id)) {
      throw new ConflictError("credential_exists", "Credential identifier already assigned");
    }
    this.credentials.set(id, { ...record });
  }

  async deactivateCredential(id: CredentialId) {
    const record = await this.getCredential(id);
    if (!record) {
      throw new NotFoundError("credential_not_found", "Credential not found");
    }
    this.credentials.set(id, { ...record, active: false });
  }

  async setIssuer(principal: Principal, authorized: boolean) {
    this.issuers.set(principal, authorized);
  }

  async nextIssuanceNonce() {
    this.issuanceNonce += 1;
    return this.issuanceNonce;
  }

  async appendEvent(entry: RecordedEvent) {
    this.events.push(copyEntry(entry));
  }

  commit() {
    this.committed.admin = this.admin;
    this.committed.issuanceNonce = this.issuanceNonce;
    for (const [id, record] of this.credentials) this.committed.credentials.set(id, record);
    for (const [principal, authorized] of this.issuers) {
      this.committed.issuers.set(principal, authorized);
    }
    this.committed.events.push(...this.events);
  }
}

export class MemoryRegistryStore implements RegistryStore {
  private readonly state: MemoryState = {
    admin: null,
    credentials: new Map(),
    issuers: new Map(),
    events: [],
    issuanceNonce: 0
  };
  private tail: Promise<void> = Promise.resolve();

  transaction<T>(work: (tx: RegistryTransaction) => Promise<T>): Promise<T> {
    const run = this.tail.then(async () => {
      const staged = new StagedTransaction(this.state);
      const result = await work(staged);
      staged.commit();
      return result;
    });
    // The lock chain only tracks completion; the outcome reaches the caller through `run`.
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  async getAdmin() {
    return this.state.admin;
  }

  async getCredential(id: CredentialId) {
    const record = this.state.credentials.get(id);
    return record ? { ...record } : null;
  }

  async isIssuer(principal: Principal) {
    return this.state.issuers.get(principal) ?? false;
  }

  async listIssuers() {
    return sortedIssuers(this.state.issuers);
  }

  async getEventHead() {
    return headOf(this.state.events);
  }

  async readEvents(options: ReadEventsOptions = {}) {
    const after = Math.max(0, options.afterSequence ?? 0);
    const limit = options.limit ?? DEFAULT_EVENT_PAGE;
    // Sequences are gapless from 1, so the array index is sequence - 1.
    return this.state.events.slice(after, after + limit).map(copyEntry);
  }

  async close() {
    await this.tail;
  }
}
