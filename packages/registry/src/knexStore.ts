import type { DbClient } from "@membership-ledger/db";
import { ConflictError, NotFoundError } from "./errors.js";
import {
  DEFAULT_EVENT_PAGE,
  type ReadEventsOptions,
  type RegistryReader,
  type RegistryStore,
  type RegistryTransaction
} from "./store.js";
import {
  RegistryEventSchema,
  type CredentialId,
  type CredentialRecord,
  type EventHead,
  type Principal,
  type RecordedEvent
} from "./types.js";

const ADMIN_KEY = "admin";
const ISSUANCE_NONCE_KEY = "issuance_nonce";
const WRITE_LOCK_KEY = "write_lock";

// pg returns bigint columns as strings and SQLite returns booleans as 0/1.
type Numeric = number | string;

type MetadataRow = { key: string; value: string; updated_at?: string };

type IssuerRow = { principal: string; authorized: boolean | number; updated_at?: string };

type CredentialRow = {
  credential_id: string;
  image_hash: string;
  holder: string;
  issuer: string;
  issued_at: Numeric;
  expires_at: Numeric;
  active: boolean | number;
};

type EventRow = {
  sequence: Numeric;
  event_type: string;
  payload: string;
  data_hash: string;
  prev_hash: string | null;
  chain_hash: string;
  recorded_at: Numeric;
};

const toCredential = (row: CredentialRow): CredentialRecord => ({
  imageHash: row.image_hash,
  holder: row.holder,
  issuer: row.issuer,
  issuedAt: Number(row.issued_at),
  expiresAt: Number(row.expires_at),
  active: Boolean(row.active)
});

const toEvent = (row: EventRow): RecordedEvent => ({
  sequence: Number(row.sequence),
  recordedAt: Number(row.recorded_at),
  event: RegistryEventSchema.parse(JSON.parse(row.payload)),
  dataHash: row.data_hash,
  prevHash: row.prev_hash,
  chainHash: row.chain_hash
});

class KnexRegistryReader implements RegistryReader {
  constructor(protected readonly db: DbClient) {}

  protected async getMeta(key: string) {
    const row = await this.db<MetadataRow>("registry_metadata").where({ key }).first();
    return row?.value ?? null;
  }

  protected async setMeta(key: string, value: string) {
    const now = new Date().toISOString();
    await this.db<MetadataRow>("registry_metadata")
      .insert({ key, value, updated_at: now })
      .onConflict("key")
      .merge({ value, updated_at: now });
  }

  getAdmin() {
    return this.getMeta(ADMIN_KEY);
  }

  async getCredential(id: CredentialId) {
    const row = await this.db<CredentialRow>("registry_credentials")
      .where({ credential_id: id })
      .first();
    return row ? toCredential(row) : null;
  }

  async isIssuer(principal: Principal) {
    const row = await this.db<IssuerRow>("registry_issuers").where({ principal }).first();
    return row ? Boolean(row.authorized) : false;
  }

  async listIssuers() {
    const rows = await this.db<IssuerRow>("registry_issuers")
      .where({ authorized: true })
      .orderBy("principal", "asc");
    return rows.map((row) => row.principal);
  }

  async getEventHead(): Promise<EventHead | null> {
    const row = await this.db<EventRow>("registry_events").orderBy("sequence", "desc").first();
    return row ? { sequence: Number(row.sequence), chainHash: row.chain_hash } : null;
  }
}

class KnexRegistryTransaction extends KnexRegistryReader implements RegistryTransaction {
  async putAdmin(admin: Principal) {
    await this.setMeta(ADMIN_KEY, admin);
  }

  async insertCredential(id: CredentialId, record: CredentialRecord) {
    if (await this.getCredential(id)) {
      throw new ConflictError("credential_exists", "Credential identifier already assigned");
    }
    await this.db<CredentialRow>("registry_credentials").insert({
      credential_id: id,
      image_hash: record.imageHash,
      holder: record.holder,
      issuer: record.issuer,
      issued_at: record.issuedAt,
      expires_at: record.expiresAt,
      active: record.active
    });
  }

  async deactivateCredential(id: CredentialId) {
    const updated = await this.db<CredentialRow>("registry_credentials")
      .where({ credential_id: id })
      .update({ active: false });
    if (updated === 0) {
      throw new NotFoundError("credential_not_found", "Credential not found");
    }
  }

  async setIssuer(principal: Principal, authorized: boolean) {
    const now = new Date().toISOString();
    await this.db<IssuerRow>("registry_issuers")
      .insert({ principal, authorized, updated_at: now })
      .onConflict("principal")
      .merge({ authorized, updated_at: now });
  }

  async nextIssuanceNonce() {
    const next = Number((await this.getMeta(ISSUANCE_NONCE_KEY)) ?? 0) + 1;
    await this.setMeta(ISSUANCE_NONCE_KEY, String(next));
    return next;
  }

  async appendEvent(entry: RecordedEvent) {
    await this.db<EventRow>("registry_events").insert({
      sequence: entry.sequence,
      event_type: entry.event.type,
      payload: JSON.stringify(entry.event),
      data_hash: entry.dataHash,
      prev_hash: entry.prevHash,
      chain_hash: entry.chainHash,
      recorded_at: entry.recordedAt
    });
  }

  /**
   * Writing the lock row takes a row lock on Postgres and the database write lock on SQLite, so
   * every registry transaction waits here for the one before it.
   */
  async acquireWriteLock() {
    await this.setMeta(WRITE_LOCK_KEY, new Date().toISOString());
  }
}

export class KnexRegistryStore extends KnexRegistryReader implements RegistryStore {
  constructor(db: DbClient) {
    super(db);
  }

  transaction<T>(work: (tx: RegistryTransaction) => Promise<T>): Promise<T> {
    return this.db.transaction(async (trx) => {
      const tx = new KnexRegistryTransaction(trx);
      await tx.acquireWriteLock();
      return work(tx);
    });
  }

  async readEvents(options: ReadEventsOptions = {}) {
    const rows = await this.db<EventRow>("registry_events")
      .where("sequence", ">", options.afterSequence ?? 0)
      .orderBy("sequence", "asc")
      .limit(options.limit ?? DEFAULT_EVENT_PAGE);
    return rows.map(toEvent);
  }

  async close() {
    await this.db.destroy();
  }
}
