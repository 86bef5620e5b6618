import { createLogger } from "@membership-ledger/shared";

export const log = createLogger("registry-service");
