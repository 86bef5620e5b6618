import type {
  CredentialId,
  CredentialRecord,
  EventHead,
  Principal,
  RecordedEvent
} from "./types.js";

export type ReadEventsOptions = {
  afterSequence?: number;
  limit?: number;
};

export interface RegistryReader {
  getAdmin(): Promise<Principal | null>;
  getCredential(id: CredentialId): Promise<CredentialRecord | null>;
  isIssuer(principal: Principal): Promise<boolean>;
  listIssuers(): Promise<Principal[]>;
  getEventHead(): Promise<EventHead | null>;
}

export interface RegistryTransaction extends RegistryReader {
  putAdmin(admin: Principal): Promise<void>;
  /** Rejects with ConflictError when the identifier is already taken. */
  insertCredential(id: CredentialId, record: CredentialRecord): Promise<void>;
  deactivateCredential(id: CredentialId): Promise<void>;
  setIssuer(principal: Principal, authorized: boolean): Promise<void>;
  /** Returns the next issuance sequence number, starting at 1. */
  nextIssuanceNonce(): Promise<number>;
  appendEvent(entry: RecordedEvent): Promise<void>;
}

/**
 * Persistence seam for the registry. Reads observe committed state only; `transaction` runs
 * `work` serialized against every other transaction and commits all of its writes or none.
 */
export interface RegistryStore extends RegistryReader {
  transaction<T>(work: (tx: RegistryTransaction) => Promise<T>): Promise<T>;
  readEvents(options?: ReadEventsOptions): Promise<RecordedEvent[]>;
  close(): Promise<void>;
}

export const DEFAULT_EVENT_PAGE = 500;
