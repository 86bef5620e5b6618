import { createLogger, type Logger } from "@membership-ledger/shared";

export type RegistryLogger = Logger;

export const consoleLogger: RegistryLogger = createLogger("membership-registry");
