export { loadConfig, substituteEnv } from "./config/loader.js";
export { parseConfig, tokentabConfigSchema } from "./config/schema.js";
export type * from "./config/types.js";
export { createLogger, type Logger } from "./logging/logger.js";
export { AccessPolicy, type ChatType, type MembershipProbe, type Requester } from "./budget/access.js";
export {
  BudgetGate,
  GUEST_IDENTITY,
  type Allowance,
  type BudgetCheckResult,
} from "./budget/gate.js";
export { UsageService, createUsageService, type UsageServiceReport } from "./budget/service.js";
export { chatTokenCost, eventCost, imageCost, transcriptionCost } from "./usage/cost.js";
export { InvalidInputError, StorageError } from "./usage/errors.js";
export { UsageLedger } from "./usage/ledger.js";
export { LedgerRegistry, type RecordResult } from "./usage/registry.js";
export { LedgerFileStore, type LedgerStore } from "./usage/store.js";
export type * from "./usage/types.js";
