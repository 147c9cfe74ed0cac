import type { BudgetConfig, BudgetPeriod } from "../config/types.js";
import type { Logger } from "../logging/logger.js";
import type { LedgerRegistry } from "../usage/registry.js";
import type { CostSnapshot } from "../usage/types.js";
import type { AccessPolicy, MembershipProbe, Requester } from "./access.js";

export const GUEST_IDENTITY = "guests";
export const GUEST_DISPLAY_NAME = "all guest users in group chats";

export type Allowance =
  | { readonly kind: "unlimited" }
  | { readonly kind: "user"; readonly amount: number }
  | { readonly kind: "guest"; readonly amount: number };

export type BudgetCheckResult =
  | { allowed: true }
  | { allowed: false; reason: "not_allowed" | "budget_exceeded"; message: string };

const PERIOD_COST: Record<BudgetPeriod, keyof CostSnapshot> = {
  daily: "costToday",
  monthly: "costMonth",
  "all-time": "costAllTime",
};

const PERIOD_SUFFIX: Record<BudgetPeriod, string> = {
  daily: " today",
  monthly: " this month",
  "all-time": "",
};

export function periodSuffix(period: BudgetPeriod): string {
  return PERIOD_SUFFIX[period];
}

export class BudgetGate {
  private readonly logger: Logger;
  // Config warnings already logged, so each appears once per process.
  private readonly warned = new Set<string>();

  constructor(
    private readonly config: BudgetConfig,
    readonly access: AccessPolicy,
    private readonly registry: LedgerRegistry,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: "budget-gate" });
  }

  get period(): BudgetPeriod {
    return this.config.period;
  }

  resolveAllowance(userId: string): Allowance {
    const budgets = this.config.userBudgets;
    if (this.access.isAdmin(userId) || budgets === "*") {
      return { kind: "unlimited" };
    }

    if (this.config.allowedUserIds === "*") {
      if (budgets.length > 1) {
        this.warnOnce(
          "open-allow-list",
          { budgets: budgets.length },
          "Several budgets set with an open allow-list, using the first for everyone",
        );
      }
      return { kind: "user", amount: budgets[0] ?? 0 };
    }

    const index = this.access.allowListIndex(userId);
    if (index !== -1) {
      const amount = budgets[index];
      if (amount === undefined) {
        this.warnOnce(
          `missing-budget:${userId}`,
          { userId },
          "No budget set for user, budget list is shorter than the allow-list",
        );
        return { kind: "user", amount: 0 };
      }
      return { kind: "user", amount };
    }

    return { kind: "guest", amount: this.config.guestBudget };
  }

  /** Allowance minus spend in the configured period; Infinity when unlimited. */
  async remainingBudget(requester: Requester): Promise<number> {
    const allowance = this.resolveAllowance(requester.userId);
    if (allowance.kind === "unlimited") return Number.POSITIVE_INFINITY;

    const ledger =
      allowance.kind === "user"
        ? await this.registry.get(requester.userId, requester.displayName)
        : await this.registry.get(GUEST_IDENTITY, GUEST_DISPLAY_NAME);
    const cost = ledger.getCurrentCost(this.registry.today())[PERIOD_COST[this.config.period]];
    return allowance.amount - cost;
  }

  async isWithinBudget(requester: Requester): Promise<boolean> {
    return (await this.remainingBudget(requester)) > 0;
  }

  async check(requester: Requester, isMember?: MembershipProbe): Promise<BudgetCheckResult> {
    if (!(await this.access.isAllowed(requester, isMember))) {
      this.logger.warn({ userId: requester.userId }, "User is not allowed to use the bot");
      return {
        allowed: false,
        reason: "not_allowed",
        message: "Sorry, you are not allowed to use this bot.",
      };
    }

    if (!(await this.isWithinBudget(requester))) {
      this.logger.warn({ userId: requester.userId }, "User reached the usage limit");
      return {
        allowed: false,
        reason: "budget_exceeded",
        message: `Sorry, you have reached your usage limit${periodSuffix(this.config.period)}.`,
      };
    }

    return { allowed: true };
  }

  private warnOnce(key: string, fields: Record<string, unknown>, msg: string): void {
    if (this.warned.has(key)) return;
    this.warned.add(key);
    this.logger.warn(fields, msg);
  }
}
