import { createDb, runMigrations } from "@membership-ledger/db";
import {
  KnexRegistryStore,
  MembershipRegistry,
  MemoryRegistryStore,
  type RecordedEvent,
  type RegistryStore
} from "@membership-ledger/registry";
import { config } from "./config.js";
import { log } from "./log.js";
import { metrics } from "./metrics.js";

let ready: Promise<MembershipRegistry> | null = null;

const createStore = async (): Promise<RegistryStore> => {
  if (config.REGISTRY_STORE === "memory") {
    log.warn("registry.store.memory", { env: config.NODE_ENV });
    return new MemoryRegistryStore();
  }
  if (!config.DATABASE_URL) {
    throw new Error("database_url_required");
  }
  const db = createDb(config.DATABASE_URL);
  if (config.AUTO_MIGRATE) {
    await runMigrations(db);
  }
  return new KnexRegistryStore(db);
};

const recordEvent = (entry: RecordedEvent) => {
  const { event } = entry;
  switch (event.type) {
    case "MembershipIssued":
      metrics.incCounter("memberships_issued_total");
      break;
    case "MembershipRevoked":
      metrics.incCounter("memberships_revoked_total");
      break;
    case "IssuerAuthorized":
      metrics.incCounter("issuer_changes_total", { change: "authorized" });
      break;
    case "IssuerRevoked":
      metrics.incCounter("issuer_changes_total", { change: "revoked" });
      break;
  }
  metrics.setGauge("registry_event_head_sequence", {}, entry.sequence);
  log.info("registry.event", { sequence: entry.sequence, type: event.type });
};

export const getRegistry = async () => {
  if (!ready) {
    ready = (async () => {
      const registry = await MembershipRegistry.open({
        store: await createStore(),
        admin: config.REGISTRY_ADMIN,
        idStrategy: config.CREDENTIAL_ID_STRATEGY,
        logger: log
      });
      registry.subscribe(recordEvent);
      return registry;
    })();
  }
  return ready;
};

export const closeRegistry = async () => {
  if (!ready) return;
  const registry = await ready;
  ready = null;
  await registry.close();
};
