import { InvariantViolation } from "./errors.js";
import { appendEvent, type RegistryEventBus } from "./eventLog.js";
import type { RegistryLogger } from "./log.js";
import type { RegistryReader, RegistryStore, RegistryTransaction } from "./store.js";
import type {
  Clock,
  IdentifierStrategy,
  Principal,
  RecordedEvent,
  RegistryEvent,
  UnixSeconds
} from "./types.js";

export type RegistryContext = {
  store: RegistryStore;
  clock: Clock;
  bus: RegistryEventBus;
  logger: RegistryLogger;
  idStrategy: IdentifierStrategy;
};

export type MutationScope = {
  tx: RegistryTransaction;
  now: UnixSeconds;
  emit: (event: RegistryEvent) => Promise<void>;
};

/**
 * Runs one mutating operation as a single store transaction. Guards, writes and event appends all
 * see the same snapshot; subscribers hear about the events only once the transaction committed.
 */
export const mutate = async <T>(
  context: RegistryContext,
  work: (scope: MutationScope) => Promise<T>
): Promise<T> => {
  const recorded: RecordedEvent[] = [];
  const result = await context.store.transaction(async (tx) => {
    // Read inside the transaction so timestamps follow commit order.
    const now = context.clock();
    const emit = async (event: RegistryEvent) => {
      recorded.push(await appendEvent(tx, event, now));
    };
    return work({ tx, now, emit });
  });
  context.bus.publish(recorded);
  return result;
};

export const loadAdmin = async (reader: RegistryReader): Promise<Principal> => {
  const admin = await reader.getAdmin();
  if (!admin) {
    throw new InvariantViolation("registry_not_initialized", "Registry has no admin");
  }
  return admin;
};

/** Query paths collapse store failures to `fallback` after logging them. */
export const failClosed = async <T>(
  context: RegistryContext,
  operation: string,
  read: () => Promise<T>,
  fallback: T
): Promise<T> => {
  try {
    return await read();
  } catch (error) {
    context.logger.error("registry.query.failed", {
      operation,
      error: error instanceof Error ? error.message : String(error)
    });
    return fallback;
  }
};
