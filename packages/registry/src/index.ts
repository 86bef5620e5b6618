export { MembershipRegistry } from "./registry.js";
export type { MembershipRegistryOptions } from "./registry.js";
export { AccessControlManager } from "./accessControl.js";
export { CredentialLedger, statusAt } from "./ledger.js";
export { VerificationEngine } from "./verification.js";
export { MemoryRegistryStore } from "./memoryStore.js";
export { KnexRegistryStore } from "./knexStore.js";
export { DEFAULT_EVENT_PAGE } from "./store.js";
export type {
  ReadEventsOptions,
  RegistryReader,
  RegistryStore,
  RegistryTransaction
} from "./store.js";
export { buildEventEntry, checkEventChain } from "./eventLog.js";
export type { ChainCheck, EventListener } from "./eventLog.js";
export { deriveCredentialId } from "./identifier.js";
export type { IssuanceContext } from "./identifier.js";
export {
  AuthorizationError,
  ConflictError,
  InvariantViolation,
  NotFoundError,
  RegistryError,
  ValidationError,
  isRegistryError
} from "./errors.js";
export type { RegistryErrorCode } from "./errors.js";
export { normalizeCredentialId, normalizeHash, normalizePrincipal } from "./validation.js";
export type { GuardResult } from "./guards.js";
export type { RegistryLogger } from "./log.js";
export { systemClock, RegistryEventSchema } from "./types.js";
export type {
  Clock,
  CredentialId,
  CredentialRecord,
  CredentialStatus,
  CredentialView,
  EventHead,
  Hash32,
  IdentifierStrategy,
  Principal,
  RecordedEvent,
  RegistryEvent,
  RegistryEventType,
  UnixSeconds
} from "./types.js";
