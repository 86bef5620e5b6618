import { test } from "node:test";
import assert from "node:assert/strict";
import { hashCanonicalJson } from "@membership-ledger/shared";
import { MembershipRegistry } from "./registry.js";
import { MemoryRegistryStore } from "./memoryStore.js";
import { buildEventEntry, checkEventChain } from "./eventLog.js";
import { ADMIN, H1, captureLogger, manualClock } from "./testing.js";
import type { RegistryTransaction } from "./store.js";
import type { CredentialId, RecordedEvent } from "./types.js";

const setup = async () => {
  const clock = manualClock();
  const capture = captureLogger();
  const registry = await MembershipRegistry.open({
    store: new MemoryRegistryStore(),
    admin: ADMIN,
    clock,
    logger: capture.logger
  });
  return { registry, clock, ...capture };
};

test("entries link to their predecessor", () => {
  const first = buildEventEntry({ type: "IssuerAuthorized", issuer: ADMIN }, null, 100);
  assert.equal(first.sequence, 1);
  assert.equal(first.prevHash, null);
  assert.equal(first.dataHash, hashCanonicalJson({ type: "IssuerAuthorized", issuer: ADMIN }));
  assert.equal(
    first.chainHash,
    hashCanonicalJson({
      prevHash: null,
      dataHash: first.dataHash,
      sequence: 1,
      type: "IssuerAuthorized",
      recordedAt: 100
    })
  );

  const second = buildEventEntry(
    { type: "IssuerRevoked", issuer: "issuer-2" },
    { sequence: first.sequence, chainHash: first.chainHash },
    101
  );
  assert.equal(second.sequence, 2);
  assert.equal(second.prevHash, first.chainHash);
  assert.deepEqual(checkEventChain([first, second]), {
    ok: true,
    head: { sequence: 2, chainHash: second.chainHash }
  });
});

test("tampering is detected", async () => {
  const { registry, clock } = await setup();
  const id = await registry.issueMembership(ADMIN, H1, "user-1", clock() + 60);
  await registry.revokeMembership(ADMIN, id);
  const entries = await registry.readEvents();
  assert.equal(entries.length, 3);

  const rewritten = entries.map((entry): RecordedEvent =>
    entry.sequence === 2
      ? { ...entry, event: { type: "MembershipIssued", id, holder: "user-2", issuer: ADMIN } }
      : entry
  );
  assert.deepEqual(checkEventChain(rewritten), {
    ok: false,
    brokenAt: 2,
    reason: "hash_mismatch"
  });

  const dropped = entries.filter((entry) => entry.sequence !== 2);
  assert.deepEqual(checkEventChain(dropped), {
    ok: false,
    brokenAt: 3,
    reason: "sequence_gap"
  });
});

test("the stored log verifies end to end", async () => {
  const { registry, clock } = await setup();
  await registry.authorizeIssuer(ADMIN, "issuer-2");
  await registry.issueMembership("issuer-2", H1, "user-1", clock() + 60);
  const head = await registry.getEventHead();
  assert.equal(head?.sequence, 3);
  assert.deepEqual(await registry.verifyEventChain(), { ok: true, head });
});

test("replay pages through the log in order", async () => {
  const { registry } = await setup();
  for (const issuer of ["issuer-2", "issuer-3", "issuer-4"]) {
    await registry.authorizeIssuer(ADMIN, issuer);
  }
  const page = await registry.readEvents({ afterSequence: 1, limit: 2 });
  assert.deepEqual(
    page.map((entry) => [entry.sequence, entry.event]),
    [
      [2, { type: "IssuerAuthorized", issuer: "issuer-2" }],
      [3, { type: "IssuerAuthorized", issuer: "issuer-3" }]
    ]
  );
  assert.deepEqual(await registry.readEvents({ afterSequence: 4 }), []);
});

test("subscribers hear committed events only", async () => {
  const { registry, clock, lines } = await setup();
  const seen: string[] = [];
  registry.subscribe(() => {
    throw new Error("listener broke");
  });
  const unsubscribe = registry.subscribe((entry) => seen.push(entry.event.type));

  const id: CredentialId = await registry.issueMembership(ADMIN, H1, "user-1", clock() + 60);
  await assert.rejects(registry.issueMembership("stranger", H1, "user-1", clock() + 60));
  await registry.revokeMembership(ADMIN, id);
  unsubscribe();
  await registry.authorizeIssuer(ADMIN, "issuer-2");

  assert.deepEqual(seen, ["MembershipIssued", "MembershipRevoked"]);
  const failures = lines.filter((line) => line.event === "registry.event.listener_failed");
  assert.equal(failures.length, 3);
  assert.deepEqual(failures[0]?.meta, {
    sequence: 2,
    type: "MembershipIssued",
    error: "listener broke"
  });
});

test("query paths fail closed when the store errors", async () => {
  class FlakyStore extends MemoryRegistryStore {
    failing = false;

    override async getCredential(id: CredentialId) {
      if (this.failing) throw new Error("store offline");
      return super.getCredential(id);
    }
  }
  const store = new FlakyStore();
  const clock = manualClock();
  const { logger, lines } = captureLogger();
  const registry = await MembershipRegistry.open({ store, admin: ADMIN, clock, logger });
  const id = await registry.issueMembership(ADMIN, H1, "user-1", clock() + 60);

  store.failing = true;
  assert.equal(await registry.verifyMembership(id, H1), false);
  assert.equal(await registry.isCredentialActive(id), false);
  const failures = lines.filter((line) => line.event === "registry.query.failed");
  assert.deepEqual(
    failures.map((line) => line.meta?.operation),
    ["verifyMembership", "isCredentialActive"]
  );
});

test("callers and subscribers cannot rewrite stored events", async () => {
  const { registry, clock } = await setup();
  registry.subscribe((entry) => {
    if (entry.event.type === "MembershipIssued") {
      entry.event.holder = "user-x";
    }
  });
  const id = await registry.issueMembership(ADMIN, H1, "user-1", clock() + 60);

  const [first] = await registry.readEvents();
  if (first?.event.type === "IssuerAuthorized") {
    first.event.issuer = "someone-else";
  }

  assert.deepEqual(
    (await registry.readEvents()).map((entry) => entry.event),
    [
      { type: "IssuerAuthorized", issuer: ADMIN },
      { type: "MembershipIssued", id, holder: "user-1", issuer: ADMIN }
    ]
  );
  assert.equal((await registry.verifyEventChain()).ok, true);
});

test("issuance is logged only once the transaction commits", async () => {
  class FailingCommitStore extends MemoryRegistryStore {
    failing = false;

    override transaction<T>(work: (tx: RegistryTransaction) => Promise<T>): Promise<T> {
      if (!this.failing) return super.transaction(work);
      return super.transaction(async (tx) => {
        await work(tx);
        throw new Error("commit failed");
      });
    }
  }
  const store = new FailingCommitStore();
  const clock = manualClock();
  const { logger, lines } = captureLogger();
  const registry = await MembershipRegistry.open({ store, admin: ADMIN, clock, logger });
  const issuedLines = () =>
    lines.filter((line) => line.event === "membership.issued").map((line) => line.meta);

  store.failing = true;
  await assert.rejects(
    registry.issueMembership(ADMIN, H1, "user-1", clock() + 60),
    /commit failed/
  );
  assert.deepEqual(issuedLines(), []);
  assert.equal((await registry.readEvents()).length, 1);

  store.failing = false;
  const id = await registry.issueMembership(ADMIN, H1, "user-1", clock() + 60);
  assert.deepEqual(issuedLines(), [{ credentialId: id, issuer: ADMIN }]);
});
