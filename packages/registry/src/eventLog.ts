import { hashCanonicalJson } from "@membership-ledger/shared";
import type { RegistryLogger } from "./log.js";
import type { RegistryTransaction } from "./store.js";
import type { EventHead, RecordedEvent, RegistryEvent, UnixSeconds } from "./types.js";

export type EventListener = (entry: RecordedEvent) => void;

export type ChainCheck =
  | { ok: true; head: EventHead | null }
  | {
      ok: false;
      brokenAt: number;
      reason: "sequence_gap" | "prev_hash_mismatch" | "hash_mismatch";
    };

const chainHashOf = (input: {
  prevHash: string | null;
  dataHash: string;
  sequence: number;
  type: string;
  recordedAt: UnixSeconds;
}) => hashCanonicalJson(input);

export const buildEventEntry = (
  event: RegistryEvent,
  head: EventHead | null,
  recordedAt: UnixSeconds
): RecordedEvent => {
  const sequence = (head?.sequence ?? 0) + 1;
  const prevHash = head?.chainHash ?? null;
  const dataHash = hashCanonicalJson(event);
  return {
    sequence,
    recordedAt,
    event,
    dataHash,
    prevHash,
    chainHash: chainHashOf({ prevHash, dataHash, sequence, type: event.type, recordedAt })
  };
};

/** Detached copy of an entry; stored entries are never handed out. */
export const copyEntry = (entry: RecordedEvent): RecordedEvent => ({
  ...entry,
  event: { ...entry.event }
});

/** Appends `event` after the transaction's current head. */
export const appendEvent = async (
  tx: RegistryTransaction,
  event: RegistryEvent,
  recordedAt: UnixSeconds
) => {
  const entry = buildEventEntry(event, await tx.getEventHead(), recordedAt);
  await tx.appendEvent(entry);
  return entry;
};

/**
 * Walks consecutive pages of the log, recomputing each link. `previous` carries the last entry of
 * the page before so checks continue across page boundaries.
 */
export const checkEventChain = (
  entries: RecordedEvent[],
  previous: EventHead | null = null
): ChainCheck => {
  let head = previous;
  for (const entry of entries) {
    const expectedSequence = (head?.sequence ?? 0) + 1;
    if (entry.sequence !== expectedSequence) {
      return { ok: false, brokenAt: entry.sequence, reason: "sequence_gap" };
    }
    if (entry.prevHash !== (head?.chainHash ?? null)) {
      return { ok: false, brokenAt: entry.sequence, reason: "prev_hash_mismatch" };
    }
    const dataHash = hashCanonicalJson(entry.event);
    const chainHash = chainHashOf({
      prevHash: entry.prevHash,
      dataHash,
      sequence: entry.sequence,
      type: entry.event.type,
      recordedAt: entry.recordedAt
    });
    if (dataHash !== entry.dataHash || chainHash !== entry.chainHash) {
      return { ok: false, brokenAt: entry.sequence, reason: "hash_mismatch" };
    }
    head = { sequence: entry.sequence, chainHash: entry.chainHash };
  }
  return { ok: true, head };
};

export class RegistryEventBus {
  private readonly listeners = new Set<EventListener>();

  constructor(private readonly logger: RegistryLogger) {}

  subscribe(listener: EventListener) {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  publish(entries: RecordedEvent[]) {
    for (const entry of entries) {
      for (const listener of this.listeners) {
        try {
          listener(copyEntry(entry));
        } catch (error) {
          this.logger.warn("registry.event.listener_failed", {
            sequence: entry.sequence,
            type: entry.event.type,
            error: error instanceof Error ? error.message : String(error)
          });
        }
      }
    }
  }
}
