import { createMetricsRegistry } from "@membership-ledger/shared";

export const metrics = createMetricsRegistry({ service: "registry-service" });

const registerRegistryMetrics = () => {
  metrics.incCounter("memberships_issued_total", {}, 0);
  metrics.incCounter("memberships_revoked_total", {}, 0);
  metrics.incCounter("issuer_changes_total", { change: "authorized" }, 0);
  metrics.incCounter("issuer_changes_total", { change: "revoked" }, 0);
  metrics.incCounter("verifications_total", { result: "valid" }, 0);
  metrics.incCounter("verifications_total", { result: "invalid" }, 0);
};

registerRegistryMetrics();
