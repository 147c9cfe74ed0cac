import type { TokentabConfig } from "../config/types.js";
import { getLogsDir } from "../config/paths.js";
import type { Logger } from "../logging/logger.js";
import { eventCost } from "../usage/cost.js";
import { LedgerRegistry, type RecordResult } from "../usage/registry.js";
import { LedgerFileStore, type LedgerStore } from "../usage/store.js";
import type { UsageEvent, UsageReport } from "../usage/types.js";
import { AccessPolicy, type Requester } from "./access.js";
import { BudgetGate, GUEST_DISPLAY_NAME, GUEST_IDENTITY } from "./gate.js";

export interface UsageServiceReport extends UsageReport {
  /** Infinity when the requester has no budget limit. */
  readonly remainingBudget: number;
}

/** Entry point for the chat transport: records usage and reports on it. */
export class UsageService {
  constructor(
    readonly registry: LedgerRegistry,
    readonly gate: BudgetGate,
    private readonly config: TokentabConfig,
  ) {}

  /**
   * Charges the requester's ledger, and the guests pool as well when the
   * requester's allowance is the guest budget. Both charges are applied even
   * when one write fails; the first failure is rethrown afterwards.
   */
  async record(requester: Requester, event: UsageEvent): Promise<RecordResult[]> {
    // Rejects a bad event before any ledger is touched.
    eventCost(event, this.config.pricing);

    const charges = [this.registry.record(requester.userId, requester.displayName, event)];
    if (this.gate.resolveAllowance(requester.userId).kind === "guest") {
      charges.push(this.registry.record(GUEST_IDENTITY, GUEST_DISPLAY_NAME, event));
    }

    const settled = await Promise.allSettled(charges);
    const results: RecordResult[] = [];
    for (const outcome of settled) {
      if (outcome.status === "rejected") throw outcome.reason;
      results.push(outcome.value);
    }
    return results;
  }

  async report(requester: Requester): Promise<UsageServiceReport> {
    const ledger = await this.registry.get(requester.userId, requester.displayName);
    const today = this.registry.today();
    return {
      identity: ledger.identity,
      displayName: ledger.displayName,
      date: today,
      cost: ledger.getCurrentCost(today),
      chatTokens: ledger.getTokenUsage(today),
      images: ledger.getImageCount(today),
      transcription: ledger.getTranscriptionDuration(today),
      remainingBudget: await this.gate.remainingBudget(requester),
    };
  }
}

export interface UsageContextOptions {
  readonly store?: LedgerStore;
  readonly now?: () => Date;
}

export function createUsageService(
  config: TokentabConfig,
  logger: Logger,
  options: UsageContextOptions = {},
): UsageService {
  const store = options.store ?? new LedgerFileStore(getLogsDir(config), logger);
  const registry = new LedgerRegistry({
    store,
    pricing: config.pricing,
    logger,
    now: options.now,
  });
  const access = new AccessPolicy(config.budget, logger);
  const gate = new BudgetGate(config.budget, access, registry, logger);
  return new UsageService(registry, gate, config);
}
